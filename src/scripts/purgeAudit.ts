import 'reflect-metadata';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { config } from '../config';
import { createLogger } from '../logger';
import AppDataSource from '../ormconfig';
import { createServices } from '../services';
import { parseInput } from '../validation/common';

const log = createLogger('purge-audit');

const argsSchema = z.object({
  days: z.coerce.number().int().min(1).default(config.attendance.auditRetentionDays),
});

export function retentionDays(argv: string[]): number {
  const { values } = parseArgs({ args: argv, options: { days: { type: 'string' } }, strict: true });
  return parseInput(argsSchema, values).days;
}

async function main() {
  const days = retentionDays(process.argv.slice(2));
  await AppDataSource.initialize();
  try {
    const removed = await createServices(AppDataSource).attendance.purgeAudit(days);
    console.log(`Removed ${removed} audit entries older than ${days} days`);
  } finally {
    await AppDataSource.destroy();
  }
}

if (require.main === module) {
  main().catch((err) => {
    log.error('Audit purge failed', err);
    process.exit(1);
  });
}
