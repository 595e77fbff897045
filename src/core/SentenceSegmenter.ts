/**
 * SentenceSegmenter - Quebra o stream de tokens do LLM em frases faláveis
 *
 * Todo delimitador (. ! ?) presente no buffer fecha uma frase, mesmo no fim
 * do chunk. Uma sequência de delimitadores ("...", "?!") conta como um só
 * limite quando chega no mesmo buffer.
 */

const SENTENCE_DELIMITERS = new Set(['.', '!', '?']);

export class SentenceSegmenter {
  private buffer = '';

  /**
   * Acumula o chunk e devolve as frases completas, em ordem
   */
  feed(chunk: string): string[] {
    if (!chunk) return [];
    this.buffer += chunk;

    const sentences: string[] = [];
    let start = 0;

    for (let i = 0; i < this.buffer.length; i++) {
      if (!SENTENCE_DELIMITERS.has(this.buffer[i])) continue;

      let end = i + 1;
      while (end < this.buffer.length && SENTENCE_DELIMITERS.has(this.buffer[end])) {
        end++;
      }

      this.collect(this.buffer.slice(start, end), sentences);
      start = end;
      i = end - 1;
    }

    this.buffer = this.buffer.slice(start);
    return sentences;
  }

  /**
   * Fim do stream: devolve o que sobrou (mesmo sem pontuação final)
   */
  flush(): string | null {
    const remainder: string[] = [];
    this.collect(this.buffer, remainder);
    this.buffer = '';
    return remainder[0] ?? null;
  }

  /** Texto recebido e ainda não emitido */
  get pending(): string {
    return this.buffer;
  }

  private collect(text: string, into: string[]): void {
    const sentence = text.trim();
    if (sentence) {
      into.push(sentence);
    }
  }
}
