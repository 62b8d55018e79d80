/**
 * Scriptable language model for tests
 */

import type { CompletionOptions, LanguageModel, PromptMessage } from '../providers/llm.js';

export type FakeLlmBehavior =
  | { kind: 'reply'; text: string }
  | { kind: 'fail'; error: Error }
  | { kind: 'hang' };

export class FakeLanguageModel implements LanguageModel {
  readonly calls: PromptMessage[][] = [];
  private queue: FakeLlmBehavior[] = [];

  constructor(private fallback: FakeLlmBehavior = { kind: 'reply', text: 'Fake answer [1]' }) {}

  /** Behavior for every call not covered by `once` */
  always(behavior: FakeLlmBehavior): this {
    this.fallback = behavior;
    return this;
  }

  /** Behavior for the next call only */
  once(behavior: FakeLlmBehavior): this {
    this.queue.push(behavior);
    return this;
  }

  async complete(messages: PromptMessage[], options: CompletionOptions = {}): Promise<string> {
    this.calls.push(messages);
    const behavior = this.queue.shift() ?? this.fallback;

    switch (behavior.kind) {
      case 'reply':
        return behavior.text;
      case 'fail':
        throw behavior.error;
      case 'hang':
        // Settles only when the caller aborts
        return new Promise<string>((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
    }
  }
}
