import type { DatabaseProvider } from '../../infra/db/client.js';
import { errorMessage } from '../errors.js';

export interface DatabaseDiagnostics {
  backend: string;
  database: string;
  database_url: string | null;
  database_name: string | null;
  connection_status: string;
  collections: string[];
}

export const MAX_LISTED_COLLECTIONS = 10;
const ERROR_PREVIEW_LENGTH = 50;

/**
 * Best-effort database health report. Each probe catches its own failures and
 * folds them into the report, so run() never rejects.
 */
export class DatabaseDiagnosticsQuery {
  constructor(
    private getDatabase: DatabaseProvider,
    private env: NodeJS.ProcessEnv = process.env
  ) {}

  async run(): Promise<DatabaseDiagnostics> {
    const report: DatabaseDiagnostics = {
      backend: '✅ Running',
      database: '❌ Not Available',
      database_url: null,
      database_name: null,
      connection_status: 'Not Connected',
      collections: [],
    };

    await this.probeStore(report);
    this.probeEnvironment(report);

    return report;
  }

  private async probeStore(report: DatabaseDiagnostics): Promise<void> {
    try {
      const handle = this.getDatabase();

      if (handle.status === 'unconfigured') {
        report.database = '⚠️  Available but not initialized';
        return;
      }
      if (handle.status === 'failed') {
        report.database = `❌ Error: ${preview(handle.error)}`;
        return;
      }

      report.database = '✅ Available';
      report.database_url = '✅ Configured';
      report.database_name = handle.store.name;
      report.connection_status = 'Connected';

      try {
        const names = await handle.store.listCollectionNames();
        report.collections = names.slice(0, MAX_LISTED_COLLECTIONS);
        report.database = '✅ Connected & Working';
      } catch (error) {
        report.database = `⚠️  Connected but Error: ${preview(error)}`;
      }
    } catch (error) {
      report.database = `❌ Error: ${preview(error)}`;
    }
  }

  private probeEnvironment(report: DatabaseDiagnostics): void {
    report.database_url = this.env.DATABASE_URL ? '✅ Set' : '❌ Not Set';
    report.database_name = this.env.DATABASE_NAME ? '✅ Set' : '❌ Not Set';
  }
}

function preview(error: unknown): string {
  return errorMessage(error).slice(0, ERROR_PREVIEW_LENGTH);
}
