import { z } from 'zod';
import type { ExecutorTarget } from './executor-interface.js';
import { UnsupportedBackendError } from '../engine/errors.js';

const LocalTargetSchema = z.object({
  type: z.literal('local'),
});

const SshTargetSchema = z.object({
  type: z.literal('ssh'),
  host: z.string().min(1),
  port: z.number().int().positive().max(65535).optional(),
  user: z.string().min(1).optional(),
  keyPath: z.string().min(1).optional(),
});

const DockerTargetSchema = z.object({
  type: z.literal('docker'),
  container: z.string().min(1),
  user: z.string().min(1).optional(),
});

const SsmTargetSchema = z.object({
  type: z.literal('ssm'),
  instanceId: z.string().min(1),
  region: z.string().min(1),
  user: z.string().min(1).optional(),
});

const ExecutorTargetSchema = z.discriminatedUnion('type', [
  LocalTargetSchema,
  SshTargetSchema,
  DockerTargetSchema,
  SsmTargetSchema,
]);

/**
 * Parse a backend selector such as `local://`, `ssh://root@web1:2222`,
 * `docker://app?user=www-data` or `ssm://i-0abc?region=eu-west-1`.
 */
export function parseBackendSelector(selector: string): ExecutorTarget {
  let url: URL;
  try {
    url = new URL(selector);
  } catch {
    throw new UnsupportedBackendError(`Invalid backend selector: ${selector}`);
  }

  const scheme = url.protocol.replace(/:$/, '');
  const host = decodeURIComponent(url.hostname);
  const param = (name: string): string | undefined => url.searchParams.get(name) ?? undefined;

  let raw: unknown;
  switch (scheme) {
    case 'local':
      raw = { type: 'local' };
      break;
    case 'ssh':
      raw = {
        type: 'ssh',
        host,
        port: url.port ? Number(url.port) : undefined,
        user: url.username ? decodeURIComponent(url.username) : undefined,
        keyPath: param('identity_file'),
      };
      break;
    case 'docker':
      raw = { type: 'docker', container: host, user: param('user') };
      break;
    case 'ssm':
      raw = { type: 'ssm', instanceId: host, region: param('region'), user: param('user') };
      break;
    default:
      throw new UnsupportedBackendError(`Unknown backend scheme: ${scheme}`);
  }

  const result = ExecutorTargetSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new UnsupportedBackendError(`Invalid backend selector ${selector}: ${errors}`);
  }

  return result.data;
}
