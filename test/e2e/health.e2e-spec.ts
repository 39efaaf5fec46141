import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from '@/app.module';
import { HttpExceptionFilter } from '@/common/filters/http-exception.filter';
import { DatabaseService } from '@/database/database.service';
import { RedisPoolService } from '@/redis/redis-pool.service';

describe('Health API (e2e)', () => {
  let app: INestApplication;

  const database = { query: jest.fn() };
  const redisPool = { isOpen: jest.fn() };

  const databaseUp = (): void => {
    database.query.mockResolvedValue({ rowCount: 1, rows: [{ ok: 1 }] });
  };

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(DatabaseService)
      .useValue(database)
      .overrideProvider(RedisPoolService)
      .useValue(redisPool)
      .compile();

    app = moduleFixture.createNestApplication({ logger: false });
    app.useGlobalFilters(new HttpExceptionFilter());
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    database.query.mockReset();
    redisPool.isOpen.mockReset();
  });

  describe('when every dependency is up', () => {
    beforeEach(() => {
      databaseUp();
      redisPool.isOpen.mockReturnValue(true);
    });

    it.each(['/health', '/api/health'])('GET %s should answer 200 healthy', async (path) => {
      const response = await request(app.getHttpServer()).get(path).expect(200);

      expect(response.body).toEqual({
        status: 'healthy',
        timestamp: expect.any(String),
        services: { database: 'healthy', redis: 'healthy' },
      });
    });

    it('GET /api/health/db should answer 200 without a services field', async () => {
      const response = await request(app.getHttpServer()).get('/api/health/db').expect(200);

      expect(response.body).toEqual({ status: 'healthy', timestamp: expect.any(String) });
      expect(database.query).toHaveBeenCalledWith('SELECT 1 AS ok');
    });
  });

  describe('when the cache is down', () => {
    beforeEach(() => {
      databaseUp();
      redisPool.isOpen.mockReturnValue(false);
    });

    it('GET /health should answer 503 naming the failing component', async () => {
      const response = await request(app.getHttpServer()).get('/health').expect(503);

      expect(response.body.status).toBe('unhealthy');
      expect(response.body.services).toEqual({ database: 'healthy', redis: 'unhealthy' });
    });

    it('GET /api/health/redis should answer 503', async () => {
      const response = await request(app.getHttpServer()).get('/api/health/redis').expect(503);

      expect(response.body).toEqual({ status: 'unhealthy', timestamp: expect.any(String) });
    });

    it('GET /api/health/db should still answer 200', async () => {
      await request(app.getHttpServer()).get('/api/health/db').expect(200);
      expect(redisPool.isOpen).not.toHaveBeenCalled();
    });
  });

  describe('when the database fails', () => {
    beforeEach(() => {
      redisPool.isOpen.mockReturnValue(true);
    });

    it('should carry the query error on the component endpoint', async () => {
      database.query.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5432'));

      const response = await request(app.getHttpServer()).get('/api/health/db').expect(503);

      expect(response.body).toEqual({
        status: 'unhealthy',
        timestamp: expect.any(String),
        error: 'connect ECONNREFUSED 127.0.0.1:5432',
      });
    });

    it('should mark a hanging query unhealthy once the probe times out', async () => {
      database.query.mockReturnValue(new Promise(() => undefined));

      const response = await request(app.getHttpServer()).get('/api/health/db').expect(503);

      expect(response.body.error).toBe('database probe timed out after 200ms');
    });

    it('should report an unexpected row count as unhealthy', async () => {
      database.query.mockResolvedValue({ rowCount: 0, rows: [] });

      const response = await request(app.getHttpServer()).get('/api/health').expect(503);

      expect(response.body.services).toEqual({ database: 'unhealthy', redis: 'healthy' });
    });
  });

  it('GET /api/health/:component should answer 404 for an unknown component', async () => {
    const response = await request(app.getHttpServer()).get('/api/health/mongo').expect(404);

    expect(response.body).toEqual({
      status: 'error',
      httpStatus: 404,
      timestamp: expect.any(String),
      path: '/api/health/mongo',
      error: 'Unknown health component: mongo',
    });
  });

  it('GET /api should list the health endpoints', async () => {
    const response = await request(app.getHttpServer()).get('/api').expect(200);

    expect(response.body.message).toBe('Stack Health API');
    expect(response.body.endpoints).toEqual({
      health: '/api/health',
      'health:database': '/api/health/db',
      'health:redis': '/api/health/redis',
    });
  });
});
