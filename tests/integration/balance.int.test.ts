/**
 * Integration Test
 * Focus:
 * - HTTP → BalanceUpdateService → cache/lookup → ledger → SQLite
 * - status codes per entry point
 */

import request from 'supertest';
import { Express } from 'express';
import { createApp } from '@/app';
import { TemperatureCache } from '@/cache/temperatureCache';
import { Db } from '@/db';
import { UserStore } from '@/modules/userStore';
import { createTestDb, seedUser } from '../helpers/db';
import {
  createWeatherClientStub,
  okResponse,
  statusError,
  WEATHER_API,
} from '../helpers/weatherClient';

describe('balance routes (integration)', () => {
  const T0 = 1_700_000_000_000;
  let now: number;
  let db: Db;
  let store: UserStore;
  let cache: TemperatureCache;
  let stub: ReturnType<typeof createWeatherClientStub>;
  let app: Express;

  beforeEach(() => {
    now = T0;
    const clock = () => now;
    db = createTestDb();
    store = new UserStore(db);
    cache = new TemperatureCache(clock);
    stub = createWeatherClientStub();
    app = createApp({ db, weatherClient: stub.client, weatherApi: WEATHER_API, cache, clock });
  });

  afterEach(() => {
    db.close();
  });

  describe('GET /update-balance/:operation/:user_id/:city', () => {
    it('decreases the balance by the city temperature', async () => {
      const user = seedUser(db, 'alice', 100);
      stub.get.mockResolvedValueOnce(okResponse(15.5));

      const res = await request(app).get(`/update-balance/decrease/${user.id}/London`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'User alice balance updated successfully by -15.5 to 84.50' });
      expect(store.findById(user.id)?.balance).toBe(84.5);
    });

    it('returns 404 for an unknown user', async () => {
      const res = await request(app).get('/update-balance/increase/31/London');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'User not found' });
      expect(stub.get).not.toHaveBeenCalled();
    });

    /**
     * Purpose:
     * Non-200 from the weather API → 400 and an unchanged balance.
     */
    it('returns 400 and keeps the balance when the weather API fails', async () => {
      const user = seedUser(db, 'alice', 100);
      stub.get.mockRejectedValueOnce(statusError(404));

      const res = await request(app).get(`/update-balance/decrease/${user.id}/atlantis`);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Failed to fetch weather in Atlantis. Balance not changed' });
      expect(store.findById(user.id)?.balance).toBe(100);
    });

    it('answers 404 for a non-numeric user id', async () => {
      const res = await request(app).get('/update-balance/increase/abc/London');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Not found' });
    });
  });

  describe('POST /update-balance', () => {
    it('clamps the balance at zero', async () => {
      const user = seedUser(db, 'bob', 10);
      stub.get.mockResolvedValueOnce(okResponse(50));

      const res = await request(app)
        .post('/update-balance')
        .send({ user_id: user.id, operation: 'decrease', city: 'Cairo' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'User bob balance updated successfully by -50 to 0.00' });
      expect(store.findById(user.id)?.balance).toBe(0);
    });

    it('returns 400 for an invalid operation', async () => {
      const res = await request(app)
        .post('/update-balance')
        .send({ user_id: 1, operation: 'multiply', city: 'Cairo' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Invalid operation specified. Use 'increase' or 'decrease'." });
    });

    /**
     * Purpose:
     * Unknown users on the body variant surface as 400, not 404.
     */
    it('returns 400 for an unknown user', async () => {
      stub.get.mockResolvedValueOnce(okResponse(12));

      const res = await request(app)
        .post('/update-balance')
        .send({ user_id: 55, operation: 'increase', city: 'Cairo' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'User not found' });
    });

    it('returns 400 when the weather API fails', async () => {
      seedUser(db, 'alice', 100);
      stub.get.mockRejectedValueOnce(statusError(500));

      const res = await request(app)
        .post('/update-balance')
        .send({ user_id: 1, operation: 'increase', city: 'paris' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Failed to fetch weather in Paris. Balance not changed' });
    });

    it('returns 400 for malformed JSON', async () => {
      const res = await request(app)
        .post('/update-balance')
        .set('Content-Type', 'application/json')
        .send('{"user_id":');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Malformed JSON body' });
    });
  });

  describe('ledger persistence failures', () => {
    /**
     * Purpose:
     * A failed write answers 500 on the path variant and 400 on the body
     * variant, with the cause in the message and the balance untouched.
     */
    it('answers 500 on GET when the balance write fails', async () => {
      const user = seedUser(db, 'alice', 100);
      stub.get.mockResolvedValueOnce(okResponse(15.5));
      jest.spyOn(UserStore.prototype, 'setBalance').mockImplementation(() => {
        throw new Error('disk full');
      });

      const res = await request(app).get(`/update-balance/decrease/${user.id}/London`);

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Error updating balance: disk full' });
      expect(store.findById(user.id)?.balance).toBe(100);
    });

    it('answers 400 on POST when the balance write fails', async () => {
      const user = seedUser(db, 'alice', 100);
      stub.get.mockResolvedValueOnce(okResponse(15.5));
      jest.spyOn(UserStore.prototype, 'setBalance').mockImplementation(() => {
        throw new Error('disk full');
      });

      const res = await request(app)
        .post('/update-balance')
        .send({ user_id: user.id, operation: 'decrease', city: 'London' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Error updating balance: disk full' });
      expect(store.findById(user.id)?.balance).toBe(100);
    });
  });

  describe('client errors raised by express', () => {
    it('answers 400 for a path parameter that cannot be decoded', async () => {
      const res = await request(app).get('/update-balance/increase/1/%E0%A4%A');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Failed to decode param '%E0%A4%A'" });
    });

    it('answers 413 for a body over the size limit', async () => {
      const res = await request(app)
        .post('/update-balance')
        .send({ user_id: 1, operation: 'increase', city: 'x'.repeat(200_000) });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: 'request entity too large' });
      expect(stub.get).not.toHaveBeenCalled();
    });
  });

  /**
   * Purpose:
   * One outbound call per city inside the TTL window, a new one after it.
   */
  it('hits the weather API once per TTL window', async () => {
    const user = seedUser(db, 'alice', 100);
    stub.get.mockResolvedValueOnce(okResponse(1)).mockResolvedValueOnce(okResponse(2));

    await request(app).get(`/update-balance/increase/${user.id}/Oslo`);
    now = T0 + 300_000;
    await request(app).post('/update-balance').send({ user_id: user.id, operation: 'increase', city: 'Oslo' });
    expect(stub.get).toHaveBeenCalledTimes(1);

    now = T0 + 600_001;
    await request(app).get(`/update-balance/increase/${user.id}/Oslo`);

    expect(stub.get).toHaveBeenCalledTimes(2);
    expect(store.findById(user.id)?.balance).toBe(104);
  });

  it('reports cached cities on the health endpoint', async () => {
    const user = seedUser(db, 'alice', 100);
    stub.get.mockResolvedValueOnce(okResponse(3));
    await request(app).get(`/update-balance/increase/${user.id}/Oslo`);

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', cachedCities: 1 });
  });
});
