#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { auditTableStatements } from '../schema/audit-table';
import { DEFAULT_AUDIT_TABLE } from '../state-machine.constants';

export function generateMigration(tableName: string = DEFAULT_AUDIT_TABLE): string {
  const statements = auditTableStatements(tableName);

  return `-- migrate:up
${statements.map((statement) => `${statement};`).join('\n\n')}

-- migrate:down
DROP TABLE IF EXISTS ${tableName};
`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      'Usage: stateful-entities generate-migration [tableName]\n\n' +
        'Generates a dbmate-compatible SQL migration for the transition audit table.\n\n' +
        'Arguments:\n' +
        `  tableName    The audit table name (default: ${DEFAULT_AUDIT_TABLE})\n\n` +
        'Example:\n' +
        '  npx stateful-entities generate-migration order_transition_logs',
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const tableName = args[1] ?? DEFAULT_AUDIT_TABLE;
  const sql = generateMigration(tableName);

  const migrationsDir = path.resolve('db', 'migrations');
  fs.mkdirSync(migrationsDir, { recursive: true });

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const filePath = path.join(migrationsDir, `${timestamp}_create_${tableName}.sql`);

  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
