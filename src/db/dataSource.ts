import { DataSource, DataSourceOptions } from 'typeorm';
import { ENTITIES } from './entities';

export type DatabaseTarget =
  | { kind: 'postgres'; url: string }
  | { kind: 'sqlite'; database: string };

export interface DataSourceExtras {
  subscribers?: DataSourceOptions['subscribers'];
}

/** Older drivers and hosting dashboards hand out `postgres://` URLs. */
export function normalizeDatabaseUrl(url: string): string {
  const trimmed = url.trim();
  return trimmed.startsWith('postgres://') ? 'postgresql://' + trimmed.slice('postgres://'.length) : trimmed;
}

export function describeTarget(target: DatabaseTarget): string {
  if (target.kind === 'sqlite') {
    return `SQLite (${target.database})`;
  }
  try {
    const { hostname, port, pathname } = new URL(target.url);
    return `PostgreSQL (${hostname}${port ? ':' + port : ''}${pathname})`;
  } catch {
    return 'PostgreSQL';
  }
}

export function createDataSource(target: DatabaseTarget, extras: DataSourceExtras = {}): DataSource {
  const common = {
    entities: ENTITIES,
    subscribers: extras.subscribers ?? [],
    synchronize: true,
    logging: false,
  };

  if (target.kind === 'postgres') {
    return new DataSource({
      ...common,
      type: 'postgres',
      url: normalizeDatabaseUrl(target.url),
      connectTimeoutMS: 5000,
    });
  }
  return new DataSource({
    ...common,
    type: 'better-sqlite3',
    database: target.database,
  });
}

/**
 * Opens the data source and runs a liveness query. A data source that fails
 * the probe is destroyed before the error is rethrown.
 */
export async function connectDataSource(target: DatabaseTarget, extras: DataSourceExtras = {}): Promise<DataSource> {
  const dataSource = createDataSource(target, extras);
  try {
    await dataSource.initialize();
    await dataSource.query('SELECT 1');
    return dataSource;
  } catch (error) {
    if (dataSource.isInitialized) {
      await dataSource.destroy();
    }
    throw error;
  }
}
