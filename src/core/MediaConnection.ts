/**
 * MediaConnection - Um WebSocket de Media Stream do Twilio
 *
 * Nasce anônima (sem callId) e é vinculada à chamada no evento "start".
 * Escritas de uma frase inteira passam pelo write lock, para que dois
 * turnos nunca intercalem frames na mesma conexão.
 */

import WebSocket from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { IMediaConnection } from '../types';
import { buildMarkMessage, buildMediaMessage } from '../providers/TwilioProvider';
import { WriteLock } from '../utils/WriteLock';

export class MediaConnection implements IMediaConnection {
  readonly id: string;
  private socket: WebSocket;
  private lock = new WriteLock();
  private boundCallId: string | null = null;
  private boundStreamSid: string | null = null;

  constructor(socket: WebSocket, id: string = uuidv4().slice(0, 8)) {
    this.socket = socket;
    this.id = id;
  }

  get callId(): string | null {
    return this.boundCallId;
  }

  get streamSid(): string | null {
    return this.boundStreamSid;
  }

  bind(callId: string, streamSid: string): void {
    this.boundCallId = callId;
    this.boundStreamSid = streamSid;
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  sendMedia(payload: Buffer): Promise<void> {
    return this.send((streamSid) => buildMediaMessage(streamSid, payload));
  }

  sendMark(name: string): Promise<void> {
    return this.send((streamSid) => buildMarkMessage(streamSid, name));
  }

  withWriteLock<T>(section: () => Promise<T>): Promise<T> {
    return this.lock.run(section);
  }

  close(code = 1000, reason = ''): void {
    if (this.socket.readyState === WebSocket.CLOSED || this.socket.readyState === WebSocket.CLOSING) {
      return;
    }
    this.socket.close(code, reason);
  }

  private send(build: (streamSid: string) => string): Promise<void> {
    const streamSid = this.boundStreamSid;
    if (!streamSid) {
      return Promise.reject(new Error(`Connection ${this.id} has no stream bound`));
    }
    if (!this.isOpen()) {
      return Promise.reject(new Error(`Connection ${this.id} is not open`));
    }

    const message = build(streamSid);
    return new Promise((resolve, reject) => {
      this.socket.send(message, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
}
