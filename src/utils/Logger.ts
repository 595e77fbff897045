/**
 * Logger - Logs por contexto ("[Gateway]", "[Pump]"...) com nível mínimo
 *
 * O nível vem de LOG_LEVEL (debug | info | warn | error | silent).
 * Cores ANSI só quando stdout é um terminal.
 */

import { config } from '../config';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Threshold = LogLevel | 'silent';

const RANK: Record<Threshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const CONTEXT_COLOR = '\x1b[35m';
const WITHIN_THRESHOLD = '\x1b[32m';

function isThreshold(name: string): name is Threshold {
  return Object.prototype.hasOwnProperty.call(RANK, name);
}

function paint(text: string, color: string): string {
  return process.stdout.isTTY ? `${color}${text}${RESET}` : text;
}

export class Logger {
  private context: string;
  private minRank: number;

  constructor(context: string, level: string = config.debug.logLevel) {
    this.context = context;
    const normalized = level.toLowerCase();
    this.minRank = isThreshold(normalized) ? RANK[normalized] : RANK.info;
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (RANK[level] < this.minRank) return;

    const timestamp = new Date().toISOString().substring(11, 23); // HH:mm:ss.SSS
    const prefix = [
      paint(timestamp, DIM),
      paint(level.toUpperCase().padEnd(5), LEVEL_COLOR[level]),
      paint(`[${this.context}]`, CONTEXT_COLOR),
    ].join(' ');
    const write = level === 'error' ? console.error : console.log;

    write(prefix, message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  /**
   * Inicia um cronômetro; a função devolvida loga e retorna os ms decorridos
   */
  time(label: string): () => number {
    const start = Date.now();
    return () => {
      const duration = Date.now() - start;
      this.debug(`⏱️ ${label} - ${duration}ms`);
      return duration;
    };
  }

  latency(stage: string, durationMs: number, threshold?: number): void {
    const exceeded = threshold !== undefined && durationMs > threshold;
    const status = threshold === undefined ? '📊' : exceeded ? '⚠️' : '✅';
    const value = paint(`${durationMs}ms`, exceeded ? LEVEL_COLOR.warn : WITHIN_THRESHOLD);

    this.info(`${status} ${stage}: ${value}`);
  }
}
