import { describe, expect, it } from 'vitest';
import { collectDiagnostics, type DatabaseProbe } from '@/lib/diagnostics';

function probe(overrides: Partial<DatabaseProbe> = {}): DatabaseProbe {
  return {
    isConfigured: () => true,
    connect: async () => 'lifestory',
    listCollections: async () => ['episode', 'season'],
    ...overrides
  };
}

describe('collectDiagnostics', () => {
  it('reports a missing configuration', async () => {
    expect(await collectDiagnostics(probe({ isConfigured: () => false }))).toEqual({
      backend: '✅ Running',
      database: '❌ Not Available',
      database_url: '❌ Not Set',
      database_name: '❌ Not Set',
      connection_status: 'Not Connected',
      collections: []
    });
  });

  it('reports a healthy connection with its collections', async () => {
    expect(await collectDiagnostics(probe())).toEqual({
      backend: '✅ Running',
      database: '✅ Connected & Working',
      database_url: '✅ Set',
      database_name: 'lifestory',
      connection_status: 'Connected',
      collections: ['episode', 'season']
    });
  });

  it('truncates connection errors to 60 characters', async () => {
    const message = 'x'.repeat(80);
    const report = await collectDiagnostics(
      probe({
        connect: async () => {
          throw new Error(message);
        }
      })
    );

    expect(report.database).toBe(`❌ Error: ${'x'.repeat(60)}`);
    expect(report.connection_status).toBe('Not Connected');
    expect(report.database_url).toBe('✅ Set');
  });

  it('stays connected when listing collections fails', async () => {
    const report = await collectDiagnostics(
      probe({
        listCollections: async () => {
          throw new Error('not authorized on lifestory');
        }
      })
    );

    expect(report).toMatchObject({
      database: '⚠️ Connected but Error: not authorized on lifestory',
      database_name: 'lifestory',
      connection_status: 'Connected',
      collections: []
    });
  });
});
