#!/usr/bin/env node

import * as fs from 'fs';
import { parseArgs } from 'util';
import { loadDeclarations } from './config.js';
import { DEFAULT_CONCURRENCY, formatResult, runDeclarations } from './verify.js';
import { BuiltinDirectory } from '../providers/directory.js';
import { initRegistry, resetRegistry } from '../engine/registry.js';
import { DEFAULT_BACKEND } from '../engine/types.js';
import { errorMessage } from '../engine/errors.js';
import type { CommandResult } from './executor-interface.js';

interface RunContext {
  directory: BuiltinDirectory;
  backend: string;
  file: string;
  concurrency: number;
}

const USAGE = `
Usage: hostcheck [options] <command>

Options:
  -f, --file <path>         Path to the declaration file (default: hostcheck.yaml)
  -b, --backend <selector>  Backend to verify against, overrides the file
                            (local://, ssh://user@host, docker://name,
                            ssm://instance-id?region=name)
  -c, --concurrency <n>     Resources verified at once (default: ${DEFAULT_CONCURRENCY});
                            each resource runs its own ssh/docker commands
  -h, --help                Show this help message

Commands:
  list                      List resource types that can be verified
  check                     Verify connectivity to the backend
  exec <command>            Execute a command on the backend
  verify                    Verify every resource declared in the file

Examples:
  hostcheck list
  hostcheck --backend ssh://root@web1 check
  hostcheck exec "systemctl status nginx"
  hostcheck --file web.yaml verify
`;

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      file: { type: 'string', short: 'f', default: 'hostcheck.yaml' },
      backend: { type: 'string', short: 'b' },
      concurrency: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });

  const [command, ...args] = positionals;

  if (values.help || !command) {
    console.log(USAGE);
    return;
  }

  const file = values.file ?? 'hostcheck.yaml';
  const context: RunContext = {
    directory: new BuiltinDirectory(),
    backend: values.backend ?? backendFromFile(file),
    file,
    concurrency: values.concurrency ? Number(values.concurrency) : DEFAULT_CONCURRENCY,
  };

  try {
    switch (command) {
      case 'list':
        listResourceTypes(context);
        break;

      case 'check':
        await checkConnectivity(context);
        break;

      case 'exec':
        if (args.length === 0) {
          console.error('Error: exec requires a command argument');
          process.exitCode = 1;
          return;
        }
        await execOnBackend(context, args.join(' '));
        break;

      case 'verify':
        await runVerification(context);
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.error('Run with --help for usage information');
        process.exitCode = 1;
    }
  } finally {
    resetRegistry();
    await context.directory.close();
  }
}

function backendFromFile(file: string): string {
  return fs.existsSync(file) ? loadDeclarations(file).backend : DEFAULT_BACKEND;
}

function listResourceTypes(context: RunContext): void {
  const registry = initRegistry(context.directory, { backend: context.backend });

  for (const [name, dispatcher] of registry) {
    console.log(`  ${name.padEnd(14)} ${dispatcher.description}`);
  }
}

async function checkConnectivity(context: RunContext): Promise<void> {
  console.log(`Checking connectivity to ${context.backend}...\n`);

  const backend = context.directory.getBackend(context.backend);
  const result = await backend.run('echo "ok"');
  const ok = result.exitCode === 0 && result.stdout.includes('ok');

  console.log(`  ${ok ? '✓' : '✗'} ${backend.executor.target}: ${ok ? 'connected' : `failed (exit ${result.exitCode})`}`);
  if (result.stderr) {
    console.log(`    stderr: ${result.stderr}`);
  }

  if (!ok) {
    process.exitCode = 1;
  }
}

async function execOnBackend(context: RunContext, command: string): Promise<void> {
  const { executor } = context.directory.getBackend(context.backend);
  console.log(`Executing on ${executor.target}: ${command}\n`);

  let result: CommandResult;
  if (executor.execStreaming) {
    result = await executor.execStreaming(command, chunk => process.stdout.write(chunk));
    console.log('');
  } else {
    result = await executor.exec(command);
    if (result.stdout) console.log(result.stdout);
  }

  if (result.stderr) console.log(`stderr: ${result.stderr}`);
  console.log(`--- exit ${result.exitCode} ---`);

  if (result.exitCode !== 0) {
    process.exitCode = 1;
  }
}

async function runVerification(context: RunContext): Promise<void> {
  const document = loadDeclarations(context.file);
  const registry = initRegistry(context.directory, { backend: context.backend });

  console.log(`Verifying ${document.resources.length} resource(s) on ${context.backend}...\n`);

  const { passed, failed } = await runDeclarations(registry, document.resources, {
    concurrency: context.concurrency,
    onResult: result => {
      for (const line of formatResult(result)) {
        console.log(line);
      }
    },
  });

  console.log(`\n${passed} passed, ${failed} failed`);

  if (failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
