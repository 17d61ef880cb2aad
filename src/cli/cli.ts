#!/usr/bin/env node
/**
 * cluster-action CLI
 * Runs one action request against the configured cluster and prints the envelope
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv, env, exit, stdin, stdout } from 'node:process';
import { z } from 'zod';
import {
  createConfiguration,
  getConfigurationSummary,
  validateConfig,
} from '../config';
import type { ResponseEnvelope } from '../domain/types';
import { createActionRequest } from '../actions/request';
import { exitCodeFor } from '../actions/response-formatter';
import { parseEvent, createHandler } from '../handler';
import { bootstrap } from '../app';

// Logs go to stderr so stdout carries only the envelope
env.LOG_DESTINATION = env.LOG_DESTINATION ?? 'stderr';

const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
  : join(__dirname, '../../package.json'); // src/cli/ -> root

function readVersion(): string {
  const parsed = z
    .object({ version: z.string() })
    .safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

interface PayloadOptions {
  file?: string;
}

async function readPayload(payload: string | undefined, options: PayloadOptions): Promise<string> {
  if (payload !== undefined) return payload;
  if (options.file) return readFileSync(options.file, 'utf-8');
  return readStdin();
}

function print(envelope: ResponseEnvelope): void {
  stdout.write(`${JSON.stringify(envelope, null, 2)}\n`);
  process.exitCode = exitCodeFor(envelope);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cluster-action')
    .description('Run one get, restart, apply, status or describe action against an EKS cluster')
    .version(readVersion());

  program
    .command('run')
    .description('execute an action request and print the response envelope')
    .argument('[payload]', 'request JSON; read from --file or stdin when omitted')
    .option('-f, --file <path>', 'read the request JSON from a file')
    .action(async (payload: string | undefined, options: PayloadOptions) => {
      const handler = createHandler(() => bootstrap());
      print(await handler(await readPayload(payload, options)));
    });

  program
    .command('validate')
    .description('check a request payload without contacting AWS or the cluster')
    .argument('[payload]', 'request JSON; read from --file or stdin when omitted')
    .option('-f, --file <path>', 'read the request JSON from a file')
    .action(async (payload: string | undefined, options: PayloadOptions) => {
      const event = parseEvent(await readPayload(payload, options));
      if (!event.ok) {
        print({ status: 'error', data: { kind: event.error.kind, message: event.error.message } });
        return;
      }

      const config = createConfiguration(env);
      const request = createActionRequest(event.value, {
        maxManifestBytes: config.execution.maxManifestBytes,
      });
      print(
        request.ok
          ? { status: 'ok', data: `valid ${request.value.action} request` }
          : { status: 'error', data: { kind: request.error.kind, message: request.error.message } },
      );
    });

  program
    .command('check-config')
    .description('validate the controller configuration taken from the environment')
    .action(() => {
      const config = createConfiguration(env);
      const { isValid, errors, warnings } = validateConfig(config, env);
      const summary = getConfigurationSummary(config);

      console.error('Configuration Summary:');
      for (const [key, value] of Object.entries(summary)) {
        console.error(`  • ${key}: ${String(value)}`);
      }
      warnings.forEach((w) => console.error(`  warning: ${w.path}: ${w.message}`));
      errors.forEach((e) => console.error(`  error: ${e.path}: ${e.message}`));

      process.exitCode = isValid ? 0 : 1;
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      exit(1);
    });
}
