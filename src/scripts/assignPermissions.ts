import 'reflect-metadata';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { createLogger } from '../logger';
import AppDataSource from '../ormconfig';
import { createServices, Services } from '../services';
import { BulkGrantSummary, PERMISSIONS, PERMISSION_GROUPS, resolvePermissionCodes } from '../services/permissionService';
import { SYSTEM_ACTOR } from '../types';
import { idSchema, parseInput } from '../validation/common';

const log = createLogger('assign-permissions');

const USAGE = [
  'Usage: assign-permissions --employee ID [--employee ID ...] [--permission CODE ...] [--group NAME ...] [--replace] [--revoke]',
  '       assign-permissions --list',
].join('\n');

const commandSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('list') }),
  z.object({
    kind: z.literal('change'),
    employeeIds: z.array(idSchema).min(1, { message: 'Name at least one --employee' }),
    permissions: z.array(z.string()),
    groups: z.array(z.string()),
    replace: z.boolean(),
    revoke: z.boolean(),
  }),
]);

export type PermissionCommand = z.infer<typeof commandSchema>;

export function parseCommand(argv: string[]): PermissionCommand {
  const { values } = parseArgs({
    args: argv,
    options: {
      employee: { type: 'string', short: 'e', multiple: true },
      permission: { type: 'string', short: 'p', multiple: true },
      group: { type: 'string', short: 'g', multiple: true },
      replace: { type: 'boolean', default: false },
      revoke: { type: 'boolean', default: false },
      list: { type: 'boolean', default: false },
    },
    strict: true,
  });
  if (values.list) return { kind: 'list' };
  return parseInput(commandSchema, {
    kind: 'change',
    employeeIds: values.employee ?? [],
    permissions: values.permission ?? [],
    groups: values.group ?? [],
    replace: values.replace ?? false,
    revoke: values.revoke ?? false,
  });
}

export type CommandResult = {
  ok: boolean;
  lines: string[];
};

function describeSummary(summary: BulkGrantSummary): CommandResult {
  const lines = summary.results.map((r) =>
    r.ok ? `${r.employeeId}: ${r.permissions.join(', ') || '(none)'}` : `${r.employeeId}: FAILED ${r.message}`,
  );
  if (summary.results.length > 1) lines.push(`${summary.succeeded}/${summary.results.length} employees updated`);
  return { ok: summary.failed === 0, lines };
}

/** Runs as the system actor; returns the printable outcome. */
export async function runPermissionCommand(services: Services, command: PermissionCommand): Promise<CommandResult> {
  if (command.kind === 'list') {
    return {
      ok: true,
      lines: [
        ...Object.entries(PERMISSIONS).map(([code, description]) => `${code}  ${description}`),
        '',
        ...Object.entries(PERMISSION_GROUPS).map(([group, codes]) => `${group}: ${codes.join(', ')}`),
      ],
    };
  }
  const codes = resolvePermissionCodes(command.permissions, command.groups);
  if (command.revoke) {
    if (command.groups.length > 0 || command.replace) throw new Error('--revoke takes only --permission');
    return describeSummary(await services.permissions.revokeBulk(SYSTEM_ACTOR, command.employeeIds, codes));
  }
  const summary = await services.permissions.assignBulk(SYSTEM_ACTOR, command.employeeIds, codes, {
    replace: command.replace,
  });
  return describeSummary(summary);
}

async function main(): Promise<number> {
  let command: PermissionCommand;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 2;
  }

  await AppDataSource.initialize();
  try {
    const result = await runPermissionCommand(createServices(AppDataSource), command);
    result.lines.forEach((line) => console.log(line));
    return result.ok ? 0 : 1;
  } finally {
    await AppDataSource.destroy();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err) => {
      log.error('Permission assignment failed', err);
      process.exit(1);
    });
}
