import express from 'express';
import { AppConfig, parseConfig } from '../config.js';
import { createApp } from '../infra/http/app.js';
import { DatabaseProbe } from '../infra/http/routes/health.js';
import { InMemoryUserRepo } from './inMemoryUserRepo.js';

export const TEST_SECRET = 'test-secret-key-0123456789';

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return parseConfig({
    NODE_ENV: 'test',
    DATABASE_URL: 'postgres://localhost:5432/unused',
    SECRET_KEY: TEST_SECRET,
    ...overrides,
  });
}

export interface TestApp {
  app: express.Express;
  userRepo: InMemoryUserRepo;
  config: AppConfig;
}

export function buildTestApp(
  options: { probeDatabase?: DatabaseProbe; env?: NodeJS.ProcessEnv } = {}
): TestApp {
  const config = testConfig(options.env);
  const userRepo = new InMemoryUserRepo();
  const app = createApp({
    config,
    userRepo,
    probeDatabase: options.probeDatabase ?? (async () => {}),
  });
  return { app, userRepo, config };
}
