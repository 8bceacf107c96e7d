import { getConnectionToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { createTestConfig } from '../test/support/config';
import { FakeConnection } from '../test/support/in-memory-repositories';
import { AppService } from './app.service';
import { AppConfigService } from './config/app-config.service';

async function createService(
  connection: FakeConnection,
  env: Record<string, string> = {},
) {
  const moduleRef = await Test.createTestingModule({
    providers: [
      AppService,
      { provide: getConnectionToken(), useValue: connection },
      { provide: AppConfigService, useValue: createTestConfig(env) },
    ],
  }).compile();
  return moduleRef.get(AppService);
}

function connectedWith(toArray: () => Promise<Array<{ name: string }>>) {
  return {
    readyState: 1,
    db: {
      databaseName: 'crypto-store',
      listCollections: () => ({ toArray }),
    },
  };
}

describe('AppService', () => {
  it('reports liveness', async () => {
    const service = await createService({ readyState: 0 });
    expect(service.getHealth()).toEqual({
      status: 'ok',
      service: 'crypto-store',
    });
  });

  it('reports a disconnected store without throwing', async () => {
    const service = await createService({ readyState: 0 });

    await expect(service.getDiagnostics()).resolves.toMatchObject({
      backend: 'running',
      database: 'not available',
      database_name: null,
      connection_status: 'not connected',
      collections: [],
    });
  });

  it('lists at most ten collections of a connected store', async () => {
    const names = Array.from({ length: 12 }, (_, i) => ({ name: `c${i}` }));
    const service = await createService(
      connectedWith(async () => names),
      { DATABASE_URL: 'mongodb://db:27017' },
    );

    const diagnostics = await service.getDiagnostics();

    expect(diagnostics).toMatchObject({
      database: 'connected and working',
      database_url: 'set',
      database_name: 'crypto-store',
      connection_status: 'connected',
    });
    expect(diagnostics.collections).toEqual(
      names.slice(0, 10).map((c) => c.name),
    );
  });

  it('turns a listing failure into a degraded status', async () => {
    const service = await createService(
      connectedWith(async () => {
        throw new Error('not authorized on crypto-store');
      }),
    );

    const diagnostics = await service.getDiagnostics();

    expect(diagnostics.database).toBe(
      'connected but error: not authorized on crypto-store',
    );
    expect(diagnostics.collections).toEqual([]);
  });
});
