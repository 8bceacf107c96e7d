import { Injectable, Logger } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection, ConnectionStates } from 'mongoose';
import { AppConfigService } from './config/app-config.service';

export interface DatabaseDiagnostics {
  backend: string;
  database: string;
  database_url: 'set' | 'not set';
  database_name: string | null;
  connection_status: string;
  collections: string[];
}

const MAX_LISTED_COLLECTIONS = 10;

function describeError(e: unknown): string {
  return (e instanceof Error ? e.message : String(e)).slice(0, 80);
}

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);

  constructor(
    @InjectConnection() private readonly connection: Connection,
    private readonly config: AppConfigService,
  ) {}

  getHealth() {
    return { status: 'ok', service: 'crypto-store' };
  }

  /** Never throws: store problems are reported in the payload. */
  async getDiagnostics(): Promise<DatabaseDiagnostics> {
    const result: DatabaseDiagnostics = {
      backend: 'running',
      database: 'not available',
      database_url: this.config.isDatabaseUrlSet ? 'set' : 'not set',
      database_name: null,
      connection_status: 'not connected',
      collections: [],
    };

    const db = this.connection.db;
    if (this.connection.readyState !== ConnectionStates.connected || !db) {
      this.logger.warn('Diagnostics requested while store is not connected');
      return result;
    }

    result.database = 'available';
    result.database_name = db.databaseName;
    result.connection_status = 'connected';
    try {
      const collections = await db
        .listCollections({}, { nameOnly: true })
        .toArray();
      result.collections = collections
        .map((collection) => collection.name)
        .slice(0, MAX_LISTED_COLLECTIONS);
      result.database = 'connected and working';
    } catch (e) {
      this.logger.warn(`Listing collections failed: ${describeError(e)}`);
      result.database = `connected but error: ${describeError(e)}`;
    }
    return result;
  }
}
