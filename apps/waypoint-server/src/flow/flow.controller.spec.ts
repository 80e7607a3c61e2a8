import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { CompanyDirectoryService } from '../signup/company-directory.service';
import { buildSignupWorkflow } from '../signup/signup.workflow';
import { FlowModule } from './flow.module';
import { FlowModuleConfig, SESSION_HEADER } from './flow.types';

const createApp = async (overrides: Partial<FlowModuleConfig> = {}): Promise<INestApplication> => {
  const moduleRef = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({
        isGlobal: true,
        ignoreEnvFile: true,
        load: [() => ({ WAYPOINT_STATE_STORE: 'memory' })],
      }),
      FlowModule.forFeature({
        workflow: buildSignupWorkflow(new CompanyDirectoryService()),
        basePath: 'api/flows',
        ...overrides,
      }),
    ],
  }).compile();
  const app = moduleRef.createNestApplication({ logger: false });
  app.setGlobalPrefix('api');
  await app.init();
  return app;
};

describe('FlowController', () => {
  let app: INestApplication;

  beforeEach(async () => {
    app = await createApp();
  });

  afterEach(async () => {
    await app.close();
  });

  it('redirects start to the first step with a new session id', async () => {
    const res = await request(app.getHttpServer()).get('/api/flows/start');

    expect(res.status).toBe(303);
    expect(res.headers.location).toBe('/api/flows/account-type');
    expect(res.headers[SESSION_HEADER]).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('walks a session through submitted steps', async () => {
    const server = app.getHttpServer();

    const submitted = await request(server)
      .post('/api/flows/account-type')
      .set(SESSION_HEADER, 'test-session')
      .send({ accountType: 'personal' });
    expect(submitted.status).toBe(303);
    expect(submitted.headers.location).toBe('/api/flows/personal-details');

    const next = await request(server).get('/api/flows/personal-details').set(SESSION_HEADER, 'test-session');
    expect(next.status).toBe(200);
    expect(next.body).toEqual({
      status: 'input_required',
      step: 'personal-details',
      action: { method: 'POST', url: '/api/flows/personal-details' },
      back: { method: 'POST', url: '/api/flows/account-type' },
      restart: { method: 'GET', url: '/api/flows/start' },
      userMessage: 'Tell us your full name and age.',
    });
  });

  it('answers invalid input with 422 and the field errors', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/flows/account-type')
      .set(SESSION_HEADER, 'test-session')
      .send({ accountType: 'charity' });

    expect(res.status).toBe(422);
    expect(res.body.status).toBe('invalid');
    expect(res.body.errors).toHaveLength(1);
  });

  it('reports a skipped step as a conflict', async () => {
    const res = await request(app.getHttpServer()).get('/api/flows/contact').set(SESSION_HEADER, 'fresh-session');

    expect(res.status).toBe(409);
    expect(res.body).toEqual({
      statusCode: 409,
      error: {
        code: 'missing_step_value',
        message: 'No stored value for step "account-type" (requested "contact")',
        label: 'account-type',
      },
    });
  });

  it('rejects streams on steps without one', async () => {
    const server = app.getHttpServer();
    await request(server)
      .post('/api/flows/account-type')
      .set(SESSION_HEADER, 'test-session')
      .send({ accountType: 'personal' });

    const res = await request(server).get('/api/flows/personal-details/stream').set(SESSION_HEADER, 'test-session');

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('unsupported_stream');
  });

  it('streams lookup results as server-sent events', async () => {
    const server = app.getHttpServer();
    await request(server)
      .post('/api/flows/account-type')
      .set(SESSION_HEADER, 'test-session')
      .send({ accountType: 'business' });

    const res = await request(server)
      .get('/api/flows/company-details/stream?message=north&message=salt')
      .set(SESSION_HEADER, 'test-session');

    const data = res.text.split('\n').filter((line) => line.startsWith('data: '));
    expect(data).toEqual([
      'data: [{"name":"Northwind Joinery","registrationNumber":"NW551902"},{"name":"Northgate Dental","registrationNumber":"NG100377"}]',
      'data: [{"name":"Saltmarsh Cycles","registrationNumber":"SM770045"}]',
    ]);
  });
});

describe('FlowController with restart on missing steps', () => {
  it('redirects a skipped step to the restart handle', async () => {
    const app = await createApp({ restartOnMissingStep: true });

    const res = await request(app.getHttpServer()).get('/api/flows/contact');

    expect(res.status).toBe(303);
    expect(res.headers.location).toBe('/api/flows/start');
    await app.close();
  });
});
