import http from 'http';
import { createApp } from './app';
import { TemperatureCache } from './cache/temperatureCache';
import { Env, loadEnv } from './config/env';
import { initUserSchema, openDatabase } from './db';
import { logger } from './logger';
import { createWeatherClient } from './modules/getWeather';

// -------------------------------------------------
// Env
// -------------------------------------------------
function readEnv(): Env {
    try {
        return loadEnv();
    } catch (err) {
        logger.fatal({ err }, 'Invalid configuration');
        process.exit(1);
    }
}

const env = readEnv();

// -------------------------------------------------
// Database
// -------------------------------------------------
const db = openDatabase(env.DATABASE_URL);
initUserSchema(db);
logger.info({ database: env.DATABASE_URL }, 'Database ready');

// -------------------------------------------------
// HTTP Server
// -------------------------------------------------
const app = createApp({
    db,
    weatherClient: createWeatherClient(),
    weatherApi: { apiUrl: env.WEATHER_API_URL, apiKey: env.API_KEY },
    cache: new TemperatureCache(),
});

const server = http.createServer(app);

// -------------------------------------------------
// Graceful shutdown handling
// -------------------------------------------------
let isShuttingDown = false;

function shutdown(signal: string) {
    if (isShuttingDown) {
        logger.warn(`Shutdown already in progress, ignoring ${signal}`);
        return;
    }
    isShuttingDown = true;

    logger.info(`Received ${signal}. Shutting down gracefully...`);

    server.close((err) => {
        if (err) {
            logger.error({ err }, 'Error while closing HTTP server');
        } else {
            logger.info('HTTP server closed');
        }

        db.close();
        logger.info('Database connection closed');
        process.exit(err ? 1 : 0);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

// -------------------------------------------------
// Start the service
// -------------------------------------------------
const PORT = Number(env.SERVER_PORT);
server.listen(PORT, () => {
    logger.info(`Server running on http://localhost:${PORT}`);
});
