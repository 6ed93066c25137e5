import { spawn, ChildProcess } from 'child_process';
import { SSMClient, StartSessionCommand, TerminateSessionCommand } from '@aws-sdk/client-ssm';
import type { CommandResult, CommandExecutor, ExecutorTarget } from './executor-interface.js';
import { Mutex } from '../lib/mutex.js';
import { debug } from '../lib/log.js';
import { errorMessage } from '../engine/errors.js';

type SsmTarget = Extract<ExecutorTarget, { type: 'ssm' }>;

const COMMAND_END_MARKER = '__HOSTCHECK_DONE_q7!x__';
const PROMPT_SETUP = `export PS1='${COMMAND_END_MARKER}'`;
const STATUS_MARKER = '__HOSTCHECK_STATUS__';
// As echoed back by the terminal; the status itself replaces %s
const STATUS_FORMAT = `${STATUS_MARKER}%s`;
const SESSION_READY_TIMEOUT_MS = 30000;
const COMMAND_TIMEOUT_MS = 1200000; // 20 minutes

interface SSMConnection {
  process: ChildProcess;
  sessionId: string;
  outputBuffer: string;
  resolveOutput?: (output: string) => void;
  rejectOutput?: (error: Error) => void;
  onStreamOutput?: (chunk: string) => void;
  streamedLength: number;
}

/**
 * Runs commands in one long-lived Session Manager shell. Commands are framed
 * by a custom prompt marker and serialized, since they share a terminal.
 */
export class SSMSessionExecutor implements CommandExecutor {
  readonly target: string;
  private connection: Promise<SSMConnection> | null = null;
  private connectionMutex = new Mutex();
  private commandMutex = new Mutex();
  private closed = false;

  constructor(
    private readonly ssm: SsmTarget,
    private readonly client: SSMClient = new SSMClient({ region: ssm.region }),
  ) {
    this.target = `ssm ${ssm.instanceId}`;
  }

  async exec(command: string): Promise<CommandResult> {
    const conn = await this.getOrCreateConnection();
    return this.commandMutex.withLock(() => this.execInternal(conn, command));
  }

  async execStreaming(command: string, onOutput: (chunk: string) => void): Promise<CommandResult> {
    const conn = await this.getOrCreateConnection();
    return this.commandMutex.withLock(() => this.execInternal(conn, command, onOutput));
  }

  async close(): Promise<void> {
    this.closed = true;
    const connectionPromise = this.connection;
    if (!connectionPromise) return;

    // Wait for any running command to finish before closing
    await this.commandMutex.withLock(async () => {
      try {
        const conn = await connectionPromise;
        conn.process.kill();
        await this.client.send(new TerminateSessionCommand({ SessionId: conn.sessionId }));
      } catch (err) {
        debug('ssm', `session cleanup for ${this.ssm.instanceId} failed: ${errorMessage(err)}`);
      }
    });
  }

  private async getOrCreateConnection(): Promise<SSMConnection> {
    if (this.closed) {
      throw new Error(`Session for ${this.ssm.instanceId} is closed`);
    }

    if (this.connection) {
      return this.connection;
    }

    return this.connectionMutex.withLock(async () => {
      if (this.connection) {
        return this.connection;
      }

      this.connection = this.createConnection();
      return this.connection;
    });
  }

  private async createConnection(): Promise<SSMConnection> {
    const { instanceId, region, user } = this.ssm;

    const startResponse = await this.client.send(new StartSessionCommand({ Target: instanceId }));

    if (!startResponse.SessionId || !startResponse.StreamUrl || !startResponse.TokenValue) {
      throw new Error('Failed to start SSM session: missing session details');
    }

    const sessionDataJson = JSON.stringify({
      SessionId: startResponse.SessionId,
      StreamUrl: startResponse.StreamUrl,
      TokenValue: startResponse.TokenValue,
    });

    const pluginArgs = [
      sessionDataJson,
      region,
      'StartSession',
      '', // profile (empty for default)
      JSON.stringify({ Target: instanceId }),
    ];

    const proc = spawn('session-manager-plugin', pluginArgs, {
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    const conn: SSMConnection = {
      process: proc,
      sessionId: startResponse.SessionId,
      outputBuffer: '',
      streamedLength: 0,
    };

    proc.stdout?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      debug('ssm', `received chunk: ${JSON.stringify(chunk)}`);
      conn.outputBuffer += chunk;
      this.streamOutputIfEnabled(conn);
      this.checkForCommandCompletion(conn);
    });

    proc.stderr?.on('data', (data: Buffer) => {
      conn.outputBuffer += data.toString();
    });

    proc.on('error', (err) => {
      conn.rejectOutput?.(err);
    });

    proc.on('close', () => {
      this.connection = null;
    });

    await this.waitForShellReady(conn);

    // Raw writes: PS1 isn't set up yet, so execInternal would hang.
    if (user) {
      conn.process.stdin?.write(`sudo su - ${user}\n`);
      await this.waitForShellReady(conn);
    }

    // Bracketed paste adds escape sequences around the prompt marker
    conn.process.stdin?.write("bind 'set enable-bracketed-paste off'\n");
    await this.waitForShellReady(conn);

    await this.execInternal(conn, PROMPT_SETUP);
    await this.execInternal(conn, 'stty -echo');

    return conn;
  }

  private waitForShellReady(conn: SSMConnection): Promise<void> {
    return new Promise((resolve, reject) => {
      const startedAt = Date.now();

      const checkReady = () => {
        if (conn.outputBuffer.includes('$') ||
            conn.outputBuffer.includes('#') ||
            conn.outputBuffer.includes(COMMAND_END_MARKER)) {
          conn.outputBuffer = '';
          resolve();
        } else if (Date.now() - startedAt > SESSION_READY_TIMEOUT_MS) {
          reject(new Error(`Timeout waiting for shell on ${this.ssm.instanceId}`));
        } else {
          setTimeout(checkReady, 100);
        }
      };

      checkReady();
    });
  }

  // The prompt marker only counts at the start of a line; mid-line it is
  // part of an echoed command.
  private checkForCommandCompletion(conn: SSMConnection): void {
    let markerIndex = conn.outputBuffer.indexOf('\n' + COMMAND_END_MARKER);
    let prefixLength = 1;

    if (markerIndex === -1) {
      markerIndex = conn.outputBuffer.indexOf('\r\n' + COMMAND_END_MARKER);
      prefixLength = 2;
    }

    if (markerIndex === -1 || !conn.resolveOutput) {
      return;
    }

    const output = conn.outputBuffer.substring(0, markerIndex);
    conn.outputBuffer = conn.outputBuffer
      .substring(markerIndex + prefixLength + COMMAND_END_MARKER.length)
      .replace(/^\r?\n/, '');

    debug('ssm', `marker found, output: ${JSON.stringify(output)}`);

    const resolveOutput = conn.resolveOutput;
    conn.resolveOutput = undefined;
    conn.rejectOutput = undefined;
    resolveOutput(output);
  }

  private execInternal(
    conn: SSMConnection,
    command: string,
    onOutput?: (chunk: string) => void,
  ): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        conn.resolveOutput = undefined;
        conn.rejectOutput = undefined;
        conn.onStreamOutput = undefined;
        reject(new Error(`Command timed out: ${command}`));
      }, COMMAND_TIMEOUT_MS);

      if (onOutput) {
        conn.streamedLength = 0;
        conn.onStreamOutput = onOutput;
      }

      conn.resolveOutput = (output: string) => {
        clearTimeout(timeout);
        conn.onStreamOutput = undefined;
        try {
          resolve(parseFramedOutput(output, command));
        } catch (err) {
          reject(err);
        }
      };

      conn.rejectOutput = (error: Error) => {
        clearTimeout(timeout);
        conn.onStreamOutput = undefined;
        reject(error);
      };

      conn.process.stdin?.write(frameCommand(command));
    });
  }

  // Streams complete lines, holding back the last one since it may be the
  // exit status.
  private streamOutputIfEnabled(conn: SSMConnection): void {
    if (!conn.onStreamOutput) return;

    const lastNewline = conn.outputBuffer.lastIndexOf('\n');
    if (lastNewline === -1) return;

    const lines = conn.outputBuffer.substring(0, lastNewline).split('\n');
    if (lines.length <= 1) return;

    const toStream = lines.slice(0, -1).join('\n') + '\n';
    if (toStream.length > conn.streamedLength) {
      const newContent = toStream.substring(conn.streamedLength);
      conn.streamedLength = toStream.length;
      conn.onStreamOutput(newContent);
    }
  }
}

/**
 * The status goes on a line of its own, after a newline of its own, so output
 * without a trailing newline cannot run into it.
 */
export function frameCommand(command: string): string {
  return `${command}; printf '\\n${STATUS_FORMAT}\\n' "$?"\n`;
}

/**
 * Split the text printed before the prompt marker into command output and
 * the status line written by frameCommand. SSM merges stderr into stdout.
 */
export function parseFramedOutput(output: string, command: string): CommandResult {
  const text = output.replace(/\r\n/g, '\n');
  const statusIndex = text.lastIndexOf(`\n${STATUS_MARKER}`);
  const status = statusIndex === -1 ? null : /^\d+/.exec(text.slice(statusIndex + 1 + STATUS_MARKER.length));
  if (!status) {
    throw new Error(`No exit status in output of: ${command}`);
  }

  // Drops only the newline printed ahead of the status
  const lines = text.slice(0, statusIndex).split('\n');

  // Echo is still on for the first commands of a session
  if (lines.length > 0 && lines[0].includes(STATUS_FORMAT)) {
    lines.shift();
  }

  return {
    stdout: lines.join('\n').trim(),
    stderr: '',
    exitCode: parseInt(status[0], 10),
  };
}
