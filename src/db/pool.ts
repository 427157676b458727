import postgres, { type Sql } from 'postgres';

/** Column names come back camelCased so rows map onto the domain types. */
export function createSql(databaseUrl: string): Sql {
  return postgres(databaseUrl, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    transform: postgres.camel,
  });
}
