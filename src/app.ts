import express, { Express } from 'express';
import { AxiosInstance } from 'axios';
import { TemperatureCache } from './cache/temperatureCache';
import { Db } from './db';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { BalanceLedger } from './modules/balanceLedger';
import { BalanceUpdateService } from './modules/balanceUpdate';
import { WeatherApiOptions } from './modules/getWeather';
import { UserService } from './modules/userService';
import { UserStore } from './modules/userStore';
import { WeatherLookup } from './modules/weather';
import { createBalanceRouter } from './routes/balance';
import { createHealthRouter } from './routes/health';
import { createUserRouter } from './routes/users';
import { Clock, systemClock } from './utils/time';

export interface AppDependencies {
    db: Db;
    weatherClient: AxiosInstance;
    weatherApi: WeatherApiOptions;
    /** Shared for the lifetime of the process; pass a fresh one per test. */
    cache?: TemperatureCache;
    clock?: Clock;
}

export function createApp(deps: AppDependencies): Express {
    const clock = deps.clock ?? systemClock;
    const cache = deps.cache ?? new TemperatureCache(clock);

    const store = new UserStore(deps.db);
    const weather = new WeatherLookup(cache, deps.weatherClient, deps.weatherApi, clock);
    const ledger = new BalanceLedger(store);
    const balances = new BalanceUpdateService(store, weather, ledger);
    const users = new UserService(store);

    const app = express();
    app.disable('x-powered-by');

    app.use(requestLogger);
    app.use(express.json());

    app.use(createHealthRouter(cache));
    app.use(createUserRouter(users));
    app.use(createBalanceRouter(balances));

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}
