import type {
  GenerationBackend,
  GenerationBackendKind,
  GenerationOptions,
  GenerationOverrides,
} from '../../core/generation/GenerationBackend.js';
import type { ContextItem } from '../../core/retrieval/RetrievalEngine.js';
import { GenerationBackendError, throwIfCancelled } from '../../core/utils/errors.js';
import { sleep } from '../../core/utils/abort.js';

export interface Script {
  /** Fragments streamed in order; `generate` returns them joined */
  fragments?: string[];
  /** Fail before producing anything */
  fail?: string;
  /** Fail after this many fragments have been streamed */
  failAfter?: number;
  /** Simulate an idle timeout: wait `timeoutMs`, then fail as timed out */
  timeout?: boolean;
  /** Pause before each fragment */
  delayMs?: number;
}

/**
 * Generation backend that follows a fixed script and records every call.
 */
export class ScriptedGenerationBackend implements GenerationBackend {
  readonly defaults: Omit<GenerationOptions, 'signal'> = {
    temperature: 0,
    topP: 1,
    maxOutputTokens: 100,
    timeoutMs: 20,
  };
  generateCalls = 0;
  streamCalls = 0;
  /** Options of every call, signal left out */
  settings: Array<Omit<GenerationOverrides, 'signal'>> = [];
  /** Fragments actually handed to a consumer */
  emitted: string[] = [];
  /** Set once a stream's cleanup ran */
  released = false;

  constructor(
    readonly name: string,
    private readonly script: Script,
    readonly kind: GenerationBackendKind = 'local'
  ) {}

  async generate(_question: string, _context: ContextItem[], overrides?: GenerationOverrides): Promise<string> {
    this.generateCalls++;
    this.record(overrides);
    const signal = overrides?.signal;
    await this.maybeFail(signal);
    return (this.script.fragments ?? []).join('');
  }

  async *stream(_question: string, _context: ContextItem[], overrides?: GenerationOverrides): AsyncGenerator<string> {
    this.streamCalls++;
    this.record(overrides);
    const signal = overrides?.signal;
    try {
      await this.maybeFail(signal);
      const fragments = this.script.fragments ?? [];
      for (let i = 0; i < fragments.length; i++) {
        if (this.script.failAfter === i) {
          throw new GenerationBackendError(`${this.name} connection reset`, { backend: this.name });
        }
        if (this.script.delayMs) await sleep(this.script.delayMs, signal);
        throwIfCancelled(signal);
        this.emitted.push(fragments[i]);
        yield fragments[i];
      }
    } finally {
      this.released = true;
    }
  }

  private record(overrides: GenerationOverrides = {}): void {
    const { signal: _signal, ...settings } = overrides;
    this.settings.push(settings);
  }

  private async maybeFail(signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal);
    if (this.script.timeout) {
      await sleep(this.defaults.timeoutMs, signal);
      throw new GenerationBackendError(`${this.name} produced no output for ${this.defaults.timeoutMs}ms`, {
        backend: this.name,
      });
    }
    if (this.script.fail) {
      throw new GenerationBackendError(this.script.fail, { backend: this.name });
    }
  }
}
