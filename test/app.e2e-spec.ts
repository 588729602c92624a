import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from 'nestjs-pino';
import request from 'supertest';
import http, { IncomingMessage, ServerResponse } from 'http';
import { AppModule } from './../src/app.module';
import { configureApp } from './../src/app.setup';

describe('Required forwarding without a shared secret (e2e)', () => {
  jest.setTimeout(30000);

  let app: INestApplication;
  let voiceServer: http.Server;
  let voiceStatus = 200;
  let calls = 0;

  beforeAll(async () => {
    voiceServer = http.createServer((req: IncomingMessage, res: ServerResponse) => {
      req.resume();
      req.on('end', () => {
        calls += 1;
        res.writeHead(voiceStatus);
        res.end(voiceStatus === 200 ? Buffer.from([1, 2]) : 'unavailable');
      });
    });

    await new Promise<void>((resolve) => {
      voiceServer.listen(0, '127.0.0.1', () => resolve());
    });

    const address = voiceServer.address();
    if (!address || typeof address !== 'object') {
      throw new Error('Failed to start voice API stand-in');
    }

    process.env.NODE_ENV = 'test';
    delete process.env.WEBHOOK_SECRET;
    process.env.VOICE_ENABLED = 'true';
    process.env.VOICE_API_URL = `http://127.0.0.1:${address.port}`;
    process.env.VOICE_API_KEY = 'test-api-key';
    process.env.VOICE_ID = 'voice-test';
    process.env.VOICE_TIMEOUT_MS = '1000';
    process.env.VOICE_FORWARD_MODE = 'required';

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication({ bufferLogs: true });
    app.useLogger(app.get(Logger));
    configureApp(app);
    await app.init();
  });

  beforeEach(() => {
    voiceStatus = 200;
    calls = 0;
  });

  afterAll(async () => {
    if (app) {
      await app.close();
    }
    await new Promise<void>((resolve) => voiceServer.close(() => resolve()));
  });

  it('accepts a webhook without any secret header', async () => {
    const response = await request(app.getHttpServer())
      .post('/webhook')
      .send({ event: 'call.started' })
      .expect(202);

    expect(response.body.forwarding).toBe('skipped');
    expect(calls).toBe(0);
  });

  it('reports delivery once the voice API has answered', async () => {
    const response = await request(app.getHttpServer())
      .post('/webhook')
      .send({ event: 'call.completed', text: 'Goodbye' })
      .expect(202);

    expect(response.body.forwarding).toBe('delivered');
    expect(calls).toBe(1);
  });

  it('fails the webhook with 502 when the voice API fails', async () => {
    voiceStatus = 503;

    const response = await request(app.getHttpServer())
      .post('/webhook')
      .send({ event: 'call.completed', text: 'Goodbye' })
      .expect(502);

    expect(response.body.message).toBe('Voice API responded with status 503');
    expect(calls).toBe(1);
  });

  it('serves the health check', async () => {
    const response = await request(app.getHttpServer()).get('/health').expect(200);

    expect(response.body.status).toBe('ok');
  });
});
