/**
 * Application context: config plus the services built from it.
 *
 * Built once per function instance on first use and shared by later
 * invocations. Tests hand their own context to the handler factories.
 */

import { neon } from '@neondatabase/serverless';
import { createDocumentRepository } from '../db/documents.js';
import { createDatabasePing, type HealthChecks } from '../db/health.js';
import { createUserRepository } from '../db/users.js';
import { AccountService } from '../services/account-service.js';
import { DocumentService } from '../services/document-service.js';
import { S3BlobStore } from '../storage/blob-store.js';
import { loadConfig, type AppConfig } from './config.js';
import { createResendEmailService } from './email-service.js';
import { createTokenService } from './jwt.js';
import { createOtpGenerator } from './otp.js';
import { createPasswordHasher } from './password.js';

export interface AppContext {
  config: AppConfig;
  accounts: AccountService;
  documents: DocumentService;
  health: HealthChecks;
}

export type ContextResolver = () => AppContext;

export function createAppContext(config: AppConfig): AppContext {
  const sql = neon(config.databaseUrl);

  const accounts = new AccountService({
    users: createUserRepository(sql),
    hasher: createPasswordHasher(config),
    tokens: createTokenService(config),
    otp: createOtpGenerator(config),
    email: createResendEmailService(config),
  });

  const blobs = new S3BlobStore(config.storage);
  const documents = new DocumentService({
    documents: createDocumentRepository(sql),
    blobs,
  });

  const health: HealthChecks = {
    database: createDatabasePing(sql),
    storage: () => blobs.ping(),
  };

  console.log(`Context: ${config.appName} services ready (token algorithm ${config.jwtAlgorithm})`);
  return { config, accounts, documents, health };
}

let appContext: AppContext | null = null;

export function getAppContext(): AppContext {
  if (!appContext) {
    appContext = createAppContext(loadConfig(process.env));
  }
  return appContext;
}
