const MAX_ERROR_LENGTH = 60;

export type DatabaseProbe = {
  isConfigured(): boolean;
  /** Connects and resolves to the database name. */
  connect(): Promise<string>;
  listCollections(): Promise<string[]>;
};

export type Diagnostics = {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: string;
  collections: string[];
};

function describeError(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return message.slice(0, MAX_ERROR_LENGTH);
}

/** Never throws: database problems are reported in the payload. */
export async function collectDiagnostics(probe: DatabaseProbe): Promise<Diagnostics> {
  const report: Diagnostics = {
    backend: '✅ Running',
    database: '❌ Not Available',
    database_url: '❌ Not Set',
    database_name: '❌ Not Set',
    connection_status: 'Not Connected',
    collections: []
  };

  if (!probe.isConfigured()) {
    return report;
  }
  report.database_url = '✅ Set';

  let name: string;
  try {
    name = await probe.connect();
  } catch (error) {
    report.database = `❌ Error: ${describeError(error)}`;
    return report;
  }

  report.database = '✅ Connected & Working';
  report.database_name = name || '✅ Connected';
  report.connection_status = 'Connected';

  try {
    report.collections = await probe.listCollections();
  } catch (error) {
    report.database = `⚠️ Connected but Error: ${describeError(error)}`;
  }

  return report;
}
