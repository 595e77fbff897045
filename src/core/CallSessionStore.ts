/**
 * CallSessionStore - Sessões de chamada ativas, indexadas por CallSid
 *
 * Criada no primeiro webhook; removida quando a chamada termina
 * (status callback, stop do stream ou sweep por inatividade).
 */

import { CallSession } from '../types';
import { TranscriptAssembler } from './TranscriptAssembler';
import { Logger } from '../utils/Logger';

export interface NewCallInfo {
  callId: string;
  from: string;
  to: string;
}

export class CallSessionStore {
  private sessions: Map<string, CallSession> = new Map();
  private logger: Logger;

  constructor() {
    this.logger = new Logger('Sessions');
  }

  getOrCreate(info: NewCallInfo, now: number = Date.now()): CallSession {
    const existing = this.sessions.get(info.callId);
    if (existing) {
      existing.lastActivityAt = now;
      return existing;
    }

    const session: CallSession = {
      callId: info.callId,
      from: info.from,
      to: info.to,
      state: 'awaiting_first_input',
      gatewayState: 'NEW',
      history: new TranscriptAssembler(),
      emptyResults: 0,
      createdAt: new Date(now),
      lastActivityAt: now,
    };
    this.sessions.set(info.callId, session);
    this.logger.info(`📞 Nova sessão ${info.callId} (${info.from} → ${info.to})`);
    return session;
  }

  get(callId: string): CallSession | undefined {
    return this.sessions.get(callId);
  }

  touch(callId: string, now: number = Date.now()): void {
    const session = this.sessions.get(callId);
    if (session) session.lastActivityAt = now;
  }

  /**
   * Marca a sessão como encerrada e a remove; devolve a sessão removida
   */
  complete(callId: string, now: number = Date.now()): CallSession | undefined {
    const session = this.sessions.get(callId);
    if (!session) return undefined;

    session.state = 'completed';
    session.gatewayState = 'ENDED';
    session.endedAt = new Date(now);
    this.sessions.delete(callId);

    const seconds = Math.round((now - session.createdAt.getTime()) / 1000);
    this.logger.info(`📴 Sessão ${callId} encerrada (${seconds}s, ${session.history.length} turnos)`);
    return session;
  }

  /** Sessões sem atividade há mais de timeoutMs */
  idle(now: number, timeoutMs: number): CallSession[] {
    return this.all().filter((session) => now - session.lastActivityAt > timeoutMs);
  }

  all(): CallSession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }
}
