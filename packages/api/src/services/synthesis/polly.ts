import {
  PollyClient,
  PollyServiceException,
  SynthesizeSpeechCommand,
  VoiceId,
  type Engine
} from '@aws-sdk/client-polly';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import type { SynthesisEngine } from '@voxq/jobs';
import { silentLogger, type Logger, type TtsRequest } from '@voxq/shared';
import { SynthesisError, mapStatusToCategory } from './errors';

/** The subset of the Polly client response the engine reads. */
export interface PollySpeechOutput {
  AudioStream?: { transformToByteArray(): Promise<Uint8Array> };
  RequestCharacters?: number;
  $metadata: { requestId?: string; httpStatusCode?: number };
}

export interface PollySender {
  send(command: SynthesizeSpeechCommand): Promise<PollySpeechOutput>;
}

export interface PollyEngineOptions {
  region: string;
  engine: Engine;
  /** Socket timeout for each request in milliseconds */
  timeoutMs: number;
  /** Injected client; a PollyClient for `region` is created otherwise */
  client?: PollySender;
  logger?: Logger;
}

const VOICE_IDS: ReadonlySet<string> = new Set(Object.values(VoiceId));

const VALIDATION_EXCEPTIONS = new Set([
  'InvalidSsmlException',
  'TextLengthExceededException',
  'LexiconNotFoundException',
  'LanguageNotSupportedException',
  'EngineNotSupportedException',
  'SsmlMarksNotSupportedForTextTypeException'
]);

/**
 * Engine backed by Amazon Polly `SynthesizeSpeech`, rendering speed, pitch and volume
 * through an SSML `<prosody>` element.
 */
export function pollyEngine(options: PollyEngineOptions): SynthesisEngine {
  const name = 'polly';
  const log = (options.logger ?? silentLogger).child({ provider: name });
  const client = options.client ?? createClient(options);

  return {
    name,
    async synthesize(request, context) {
      if (!isVoiceId(request.voice)) {
        throw new SynthesisError({
          message: `Unknown Polly voice: ${request.voice}`,
          category: 'VALIDATION',
          provider: name
        });
      }

      const start = Date.now();
      const command = new SynthesizeSpeechCommand({
        Engine: options.engine,
        OutputFormat: 'mp3',
        TextType: 'ssml',
        Text: buildSsml(request, { includePitch: options.engine === 'standard' }),
        VoiceId: request.voice
      });

      let output: PollySpeechOutput;
      try {
        output = await client.send(command);
      } catch (error) {
        throw toSynthesisError(error, name);
      }

      const audio = output.AudioStream ? await output.AudioStream.transformToByteArray() : new Uint8Array();
      if (audio.byteLength === 0) {
        throw new SynthesisError({
          message: 'polly returned empty audio',
          category: 'FAILED_STATUS',
          provider: name,
          requestId: output.$metadata.requestId ?? null
        });
      }

      log.debug('Synthesis finished', {
        jobId: context.jobId,
        bytes: audio.byteLength,
        characters: output.RequestCharacters,
        duration_ms: Date.now() - start,
        requestId: output.$metadata.requestId
      });
      return audio;
    }
  };
}

function createClient(options: PollyEngineOptions): PollySender {
  const polly = new PollyClient({
    region: options.region,
    requestHandler: new NodeHttpHandler({ connectionTimeout: 1500, requestTimeout: options.timeoutMs })
  });
  return { send: command => polly.send(command) };
}

function isVoiceId(voice: string): voice is VoiceId {
  return VOICE_IDS.has(voice);
}

function toSynthesisError(error: unknown, provider: string): SynthesisError {
  if (error instanceof PollyServiceException) {
    const statusCode = error.$metadata.httpStatusCode;
    const category = VALIDATION_EXCEPTIONS.has(error.name)
      ? 'VALIDATION'
      : error.name === 'ThrottlingException'
        ? 'QUOTA'
        : statusCode !== undefined
          ? mapStatusToCategory(statusCode)
          : 'SERVER';
    return new SynthesisError({
      message: `polly ${error.name}: ${error.message}`,
      category,
      ...(statusCode !== undefined ? { statusCode } : {}),
      provider,
      requestId: error.$metadata.requestId ?? null,
      cause: error
    });
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'RequestTimeout')) {
    return new SynthesisError({ message: `polly timed out: ${error.message}`, category: 'TIMEOUT', provider, cause: error });
  }
  return new SynthesisError({
    message: `polly request failed: ${error instanceof Error ? error.message : String(error)}`,
    category: 'SERVER',
    provider,
    cause: error
  });
}

/**
 * Prosody rendering of a request:
 * - speed 1.0 → `rate="100%"`
 * - pitch +10 → `pitch="+10%"` (standard voices only)
 * - volume 2.0 → `volume="+6dB"`, volume 0 → `volume="silent"`
 */
export function buildSsml(request: TtsRequest, options: { includePitch: boolean }): string {
  const attributes = [`rate="${Math.round(request.speed * 100)}%"`];
  if (options.includePitch) attributes.push(`pitch="${signed(request.pitch)}%"`);
  attributes.push(`volume="${volumeToDecibels(request.volume)}"`);
  return `<speak><prosody ${attributes.join(' ')}>${escapeXml(request.text)}</prosody></speak>`;
}

/** Linear gain to Polly's volume attribute. */
export function volumeToDecibels(volume: number): string {
  if (volume <= 0) return 'silent';
  return `${signed(Math.round(20 * Math.log10(volume)))}dB`;
}

function signed(value: number): string {
  return value >= 0 ? `+${value}` : String(value);
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
