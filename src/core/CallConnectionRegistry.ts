/**
 * CallConnectionRegistry - Diretório callId → conexão de Media Stream
 *
 * Fonte única de verdade para "para onde mando o áudio desta chamada".
 * Todas as operações são síncronas: rodam inteiras no event loop, sem
 * await no meio, então lookups e register/remove nunca se intercalam.
 *
 * Sobrescrita: register() com um callId já presente substitui a entrada
 * (a última conexão vence) e devolve a conexão deslocada. Fechar a antiga
 * é opcional (closeReplaced).
 */

import { IMediaConnection } from '../types';
import { Logger } from '../utils/Logger';

export interface CallConnectionRegistryOptions {
  /** Fecha a conexão antiga quando outra é registrada no mesmo callId */
  closeReplaced?: boolean;
}

export class CallConnectionRegistry {
  private connections: Map<string, IMediaConnection> = new Map();
  private closeReplaced: boolean;
  private logger: Logger;

  constructor(options: CallConnectionRegistryOptions = {}) {
    this.closeReplaced = options.closeReplaced ?? false;
    this.logger = new Logger('Registry');
  }

  /**
   * Registra a conexão; devolve a conexão anterior se houve sobrescrita
   */
  register(callId: string, connection: IMediaConnection): IMediaConnection | undefined {
    const previous = this.connections.get(callId);
    this.connections.set(callId, connection);

    if (!previous || previous === connection) {
      this.logger.debug(`📇 Conexão ${connection.id} registrada para call ${callId}`);
      return undefined;
    }

    this.logger.warn(`⚠️ Call ${callId}: conexão ${previous.id} substituída por ${connection.id}`);
    if (this.closeReplaced) {
      previous.close(4000, 'replaced');
    }
    return previous;
  }

  lookup(callId: string): IMediaConnection | undefined {
    return this.connections.get(callId);
  }

  /**
   * Remove a entrada. Com `expected`, só remove se ainda for aquela conexão
   * (um socket antigo fechando não derruba o que o substituiu).
   */
  remove(callId: string, expected?: IMediaConnection): boolean {
    const current = this.connections.get(callId);
    if (!current) return false;
    if (expected && current !== expected) {
      this.logger.debug(`📇 Remoção ignorada: call ${callId} já pertence a ${current.id}`);
      return false;
    }

    this.connections.delete(callId);
    this.logger.debug(`📇 Conexão ${current.id} removida de call ${callId}`);
    return true;
  }

  callIds(): string[] {
    return [...this.connections.keys()];
  }

  get size(): number {
    return this.connections.size;
  }
}
