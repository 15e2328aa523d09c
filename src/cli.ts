#!/usr/bin/env node
/**
 * lab-links - reconcile a links file against a lab
 *
 *   lab-links <plan|apply|refresh|destroy> [-f links.yaml] [-s links.state.yaml]
 *
 * Connection settings come from EVE_HOST, EVE_USER and EVE_PASSWORD.
 */

import { parseArgs } from 'util';

import { HttpLabClient } from './client/HttpLabClient';
import type { LabApi } from './client/LabApi';
import { loadClientConfig } from './client/config';
import { loadDeclarations } from './io/DeclarationIO';
import { LinkStateStore } from './io/LinkStateIO';
import { nodeFsAdapter } from './io/NodeFsAdapter';
import type { FileSystemAdapter } from './io/types';
import { log, setLogLevel } from './logging/logger';
import { isLogLevel } from './logging/loggerUtils';
import { LinkService } from './services/linkService';

const COMMANDS = ['plan', 'apply', 'refresh', 'destroy'] as const;
type Command = (typeof COMMANDS)[number];

export const USAGE = 'usage: lab-links <plan|apply|refresh|destroy> [-f links.yaml] [-s links.state.yaml] [--log-level level]';

function isCommand(value: string | undefined): value is Command {
  return value !== undefined && (COMMANDS as readonly string[]).includes(value);
}

export interface CliDeps {
  fs: FileSystemAdapter;
  env: NodeJS.ProcessEnv;
  /** Builds the lab API once settings are known */
  createApi?: (env: NodeJS.ProcessEnv) => LabApi;
}

function defaultApi(env: NodeJS.ProcessEnv): LabApi {
  return new HttpLabClient({ config: loadClientConfig(env), logger: log });
}

async function runCommand(command: Command, service: LinkService, fs: FileSystemAdapter, file: string): Promise<number> {
  switch (command) {
    case 'plan': {
      const changes = await service.plan(await loadDeclarations(fs, file));
      for (const change of changes) {
        log.info(`${change.action.padEnd(6)} ${change.name}`);
      }
      return 0;
    }
    case 'apply': {
      const report = await service.apply(await loadDeclarations(fs, file));
      log.info(
        `created ${report.created.length}, updated ${report.updated.length}, ` +
          `deleted ${report.deleted.length}, unchanged ${report.unchanged.length}`
      );
      return 0;
    }
    case 'refresh': {
      const drift = await service.refresh();
      for (const entry of drift) {
        log.warn(`${entry.name}: ${entry.error.message}`);
      }
      return drift.length > 0 ? 1 : 0;
    }
    case 'destroy': {
      const deleted = await service.destroy();
      log.info(`deleted ${deleted.length} link(s)`);
      return 0;
    }
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      file: { type: 'string', short: 'f', default: 'links.yaml' },
      state: { type: 'string', short: 's', default: 'links.state.yaml' },
      'log-level': { type: 'string' },
    },
  });
}

export async function main(argv: string[], deps: CliDeps = { fs: nodeFsAdapter, env: process.env }): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    log.error(err instanceof Error ? err.message : String(err));
    log.error(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  const command = positionals[0];
  if (!isCommand(command)) {
    log.error(USAGE);
    return 2;
  }

  const level = values['log-level'];
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      log.error(`unknown log level ${level}`);
      return 2;
    }
    setLogLevel(level);
  }

  try {
    const api = (deps.createApi ?? defaultApi)(deps.env);
    const store = new LinkStateStore({ fs: deps.fs, filePath: values.state ?? 'links.state.yaml', logger: log });
    const service = new LinkService({ api, store, logger: log });
    return await runCommand(command, service, deps.fs, values.file ?? 'links.yaml');
  } catch (err) {
    log.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      log.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  );
}
