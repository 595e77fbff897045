/**
 * WriteLock - Serializa seções assíncronas sobre um mesmo recurso
 *
 * Cada run() encadeia na promise anterior: a próxima seção só começa
 * quando a atual termina (com sucesso ou erro). Mesma ideia da fila de TTS
 * por chamada, mas reutilizável por conexão.
 */

export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(section: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(section);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return result;
  }

  /** Seções em execução ou aguardando */
  get queued(): number {
    return this.pending;
  }
}
