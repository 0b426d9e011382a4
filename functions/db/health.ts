import type { NeonQueryFunction } from '@neondatabase/serverless';

export type ConnectivityCheck = () => Promise<boolean>;

export interface HealthChecks {
  database: ConnectivityCheck;
  storage: ConnectivityCheck;
}

export function createDatabasePing(sql: NeonQueryFunction<false, false>): ConnectivityCheck {
  return async () => {
    try {
      await sql`SELECT 1`;
      return true;
    } catch (error) {
      console.error('Database: Connectivity check failed:', error);
      return false;
    }
  };
}
