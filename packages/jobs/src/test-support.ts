import type { TtsRequest } from '@voxq/shared';
import type { SynthesisContext, SynthesisEngine } from './engine';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function ttsRequest(text: string, overrides: Partial<TtsRequest> = {}): TtsRequest {
  return { text, voice: 'Joanna', pitch: 0, speed: 1, volume: 1, ...overrides };
}

export function audioBytes(length = 200): Uint8Array {
  return new Uint8Array(length).fill(1);
}

/** Engine whose calls stay pending until the test settles them. */
export class ControlledEngine implements SynthesisEngine {
  readonly name = 'controlled';
  readonly calls: { text: string; jobId: string; done: Deferred<Uint8Array> }[] = [];

  synthesize(request: TtsRequest, context: SynthesisContext): Promise<Uint8Array> {
    const done = deferred<Uint8Array>();
    this.calls.push({ text: request.text, jobId: context.jobId, done });
    return done.promise;
  }

  /** Resolve every call still pending with default audio. */
  settleAll(): void {
    for (const call of this.calls) call.done.resolve(audioBytes());
  }
}

/** Engine that answers immediately with fixed-size audio and records call order. */
export class InstantEngine implements SynthesisEngine {
  readonly name = 'instant';
  readonly texts: string[] = [];

  constructor(private readonly bytes = 200) {}

  async synthesize(request: TtsRequest): Promise<Uint8Array> {
    this.texts.push(request.text);
    return audioBytes(this.bytes);
  }
}
