/**
 * Debug log for sr-topology runs.
 * Appends to .sr-topology/debug.log: one session block per command, a
 * RESOLVED line per resolution and full errors.
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';
import type { ResolvedTopology } from '@sr-topology/topology';

const LOG_DIR = '.sr-topology';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

let logFilePath: string | null = null;
let sessionStarted = false;
let disabled = false;

export interface SessionInfo {
  command: string;
  topology?: string;
}

export interface CommandLogger {
  info: (message: string, data?: unknown) => void;
  resolved: (resolved: ResolvedTopology) => void;
}

/**
 * Local .sr-topology when the working directory has one, else the home directory
 */
export function getLogPath(): string {
  if (!logFilePath) {
    const localDir = path.join(process.cwd(), LOG_DIR);
    const homeDir = path.join(homedir(), LOG_DIR);

    if (fs.existsSync(localDir)) {
      logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    } else {
      fs.mkdirSync(homeDir, { recursive: true });
      logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
    }
  }
  return logFilePath;
}

export function formatSessionHeader(info: SessionInfo, timestamp: string): string {
  const separator = '='.repeat(80);
  const topology = info.topology ? ` (topology ${info.topology})` : '';
  return `\n${separator}\n[${timestamp}] sr-topology ${info.command}${topology}\n${separator}\n`;
}

export function formatEntry(level: string, message: string, data?: unknown): string {
  let entry = `[${new Date().toISOString()}] [${level}] ${message}`;

  if (data instanceof Error) {
    entry += `\n  Error: ${data.message}`;
    if (data.stack) {
      entry += `\n  Stack: ${data.stack}`;
    }
  } else if (typeof data === 'object' && data !== null) {
    entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
  } else if (data !== undefined) {
    entry += `\n  Data: ${String(data)}`;
  }

  return entry + '\n';
}

/**
 * One-line summary of a resolution: parameters, then node names
 */
export function formatResolution(resolved: ResolvedTopology): string {
  const parameters = Object.entries(resolved.parameters).map(
    ([name, value]) => `${name}=${value || '(none)'}`
  );
  const nodes = resolved.nodes.map(n => n.hostname).join(',');
  return [resolved.name, ...parameters, `nodes=${nodes}`].join(' ');
}

function disableLogging(error: unknown): void {
  if (disabled) return;
  disabled = true;
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`sr-topology: debug log disabled (${message})\n`);
}

function append(text: string): void {
  if (disabled) return;

  try {
    fs.appendFileSync(getLogPath(), text);
  } catch (err) {
    disableLogging(err);
  }
}

function startSession(info: SessionInfo): void {
  if (sessionStarted) return;
  sessionStarted = true;

  try {
    const logPath = getLogPath();
    if (fs.existsSync(logPath) && fs.statSync(logPath).size > MAX_LOG_SIZE) {
      fs.rmSync(`${logPath}.old`, { force: true });
      fs.renameSync(logPath, `${logPath}.old`);
    }
  } catch (err) {
    disableLogging(err);
  }

  append(formatSessionHeader(info, new Date().toISOString()));
}

/**
 * Log a full error with the command it came from
 */
export function logFullError(context: string, error: unknown): void {
  startSession({ command: context });
  append(formatEntry('ERROR', `Error in ${context}`, error instanceof Error ? error : String(error)));
}

/**
 * Create a logger for one command run against a topology
 */
export function createCommandLogger(commandName: string, topology?: string): CommandLogger {
  const session: SessionInfo = { command: commandName, topology };

  return {
    info: (message, data) => {
      startSession(session);
      append(formatEntry('INFO', `[${commandName}] ${message}`, data));
    },
    resolved: resolved => {
      startSession(session);
      append(formatEntry('RESOLVED', `[${commandName}] ${formatResolution(resolved)}`));
    },
  };
}
