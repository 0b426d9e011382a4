import { AccountService } from '../services/account-service.js';
import { DocumentService } from '../services/document-service.js';
import type { AppConfig } from '../utils/config.js';
import type { AppContext } from '../utils/context.js';
import { createTokenService } from '../utils/jwt.js';
import { createOtpGenerator } from '../utils/otp.js';
import { createPasswordHasher } from '../utils/password.js';
import {
  MemoryBlobStore,
  MemoryDatabase,
  MemoryDocumentRepository,
  MemoryUserRepository,
  RecordingEmailService,
} from './memory-store.js';

export const TEST_CONFIG: AppConfig = Object.freeze({
  appName: 'Skynet',
  jwtSecret: 'test-secret',
  jwtAlgorithm: 'HS256',
  accessTokenTtlMinutes: 30,
  otpTtlMinutes: 10,
  bcryptRounds: 4,
  databaseUrl: 'postgres://test',
  resendApiKey: 'test-key',
  fromEmail: 'noreply@test.local',
  storage: Object.freeze({ bucket: 'test-bucket', region: 'us-east-1' }),
});

/** Mutable clock shared by every service in a test context */
export class TestClock {
  current: Date;

  constructor(start: string = '2026-01-01T00:00:00.000Z') {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current.getTime());

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60 * 1000);
  }
}

export interface TestContext extends AppContext {
  clock: TestClock;
  users: MemoryUserRepository;
  documentRows: MemoryDocumentRepository;
  blobs: MemoryBlobStore;
  mailer: RecordingEmailService;
  database: MemoryDatabase;
}

export function createTestContext(config: AppConfig = TEST_CONFIG): TestContext {
  const clock = new TestClock();
  const users = new MemoryUserRepository();
  const documentRows = new MemoryDocumentRepository();
  const blobs = new MemoryBlobStore();
  const mailer = new RecordingEmailService();
  const database = new MemoryDatabase();
  let nextBlobId = 1;

  const accounts = new AccountService({
    users,
    hasher: createPasswordHasher(config),
    tokens: createTokenService(config),
    otp: createOtpGenerator(config),
    email: mailer,
    now: clock.now,
  });

  const documents = new DocumentService({
    documents: documentRows,
    blobs,
    generateId: () => `blob-${nextBlobId++}`,
  });

  const health = {
    database: () => database.ping(),
    storage: () => blobs.ping(),
  };

  return { config, accounts, documents, health, clock, users, documentRows, blobs, mailer, database };
}
