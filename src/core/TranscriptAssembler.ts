/**
 * TranscriptAssembler - Histórico de turnos de uma chamada
 *
 * Guarda falas do usuário e respostas do assistente na ordem em que
 * aconteceram; é o contexto enviado ao LLM a cada turno.
 */

import { ChatMessage, ConversationTurn } from '../types';

export class TranscriptAssembler {
  private history: ConversationTurn[] = [];

  addUser(content: string, timestamp: Date = new Date()): void {
    this.append('user', content, timestamp);
  }

  addAssistant(content: string, timestamp: Date = new Date()): void {
    this.append('assistant', content, timestamp);
  }

  private append(role: ConversationTurn['role'], content: string, timestamp: Date): void {
    const text = content.trim();
    if (!text) return;
    this.history.push({ role, content: text, timestamp });
  }

  turns(): ConversationTurn[] {
    return [...this.history];
  }

  get length(): number {
    return this.history.length;
  }

  lastTurn(): ConversationTurn | undefined {
    return this.history[this.history.length - 1];
  }

  /**
   * Monta as mensagens para o LLM: system + histórico + fala pendente.
   * A fala pendente não é duplicada se já for o último turno do usuário.
   */
  toChatMessages(systemPrompt: string, utterance?: string): ChatMessage[] {
    const messages: ChatMessage[] = [];
    if (systemPrompt.trim()) {
      messages.push({ role: 'system', content: systemPrompt });
    }

    for (const turn of this.history) {
      messages.push({ role: turn.role, content: turn.content });
    }

    const pending = utterance?.trim();
    if (pending) {
      const last = this.lastTurn();
      if (!last || last.role !== 'user' || last.content !== pending) {
        messages.push({ role: 'user', content: pending });
      }
    }

    return messages;
  }

  toTranscript(): string {
    return this.history.map((turn) => `${turn.role}: ${turn.content}\n`).join('');
  }
}
