/**
 * Mock factories for testing.
 * Provides an in-process transport whose operations follow a script.
 */

import type {
  Transport,
  TransportOperation,
  TransportOutcome,
  TransportRequest,
} from '../transport/types.js';
import type { Logger } from '../logging/types.js';

// ============================================================================
// Scripted Transport
// ============================================================================

/**
 * State reported by an operation for one tick before it completes.
 */
export interface ProgressFrame {
  readonly downloadedBytes: number;
  /** Raw Content-Length header value visible during this frame */
  readonly contentLength?: string;
}

/**
 * Script for one transport operation.
 */
export interface ScriptedResponse {
  /** Terminal outcome (default: 'success') */
  readonly outcome?: TransportOutcome;
  /** Status code (default: 200) */
  readonly status?: number;
  /** Body delivered on completion */
  readonly body?: string | Uint8Array;
  /** Response headers visible after completion */
  readonly headers?: Readonly<Record<string, string>>;
  /** One frame per tick; the operation completes on the tick after the last frame */
  readonly frames?: readonly ProgressFrame[];
  /** Never completes on its own; only abort() ends it */
  readonly hang?: boolean;
  readonly errorMessage?: string;
  readonly timedOut?: boolean;
}

/**
 * Scripted transport with inspection helpers.
 */
export interface ScriptedTransport extends Transport {
  /** Requests received, in order */
  readonly requests: TransportRequest[];
  /** Number of abort() calls that ended a running operation */
  readonly abortCount: () => number;
  /** Advances every running operation by one frame */
  readonly tick: () => Promise<void>;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

const findHeader = (
  headers: Readonly<Record<string, string>> | undefined,
  name: string
): string | undefined => {
  if (headers === undefined) {
    return undefined;
  }
  const match = Object.entries(headers).find(([key]) => key.toLowerCase() === name.toLowerCase());
  return match?.[1];
};

const isScriptList = (
  value: ScriptedResponse | readonly ScriptedResponse[]
): value is readonly ScriptedResponse[] => Array.isArray(value);

/**
 * Creates a transport whose operations follow the given scripts.
 * A single script is reused for every request; a list is consumed in order.
 */
export const createScriptedTransport = (
  scripts: ScriptedResponse | readonly ScriptedResponse[] = {}
): ScriptedTransport => {
  const requests: TransportRequest[] = [];
  const advancers = new Set<() => void>();
  let aborts = 0;

  const nextScript = (): ScriptedResponse => {
    if (!isScriptList(scripts)) {
      return scripts;
    }
    return scripts[requests.length - 1] ?? {};
  };

  const send = (request: TransportRequest): TransportOperation => {
    requests.push(request);
    const script = nextScript();
    const frames = script.frames ?? [];
    const body =
      typeof script.body === 'string' ? encoder.encode(script.body) : (script.body ?? new Uint8Array(0));

    let frameIndex = 0;
    let completed = false;
    let aborted = false;
    let resolveDone: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      resolveDone = resolve;
    });

    const complete = (): void => {
      completed = true;
      advancers.delete(advance);
      resolveDone();
    };

    const advance = (): void => {
      frameIndex += 1;
      if (frameIndex >= frames.length && script.hang !== true) {
        complete();
      }
    };

    const data = (): Uint8Array => (completed && !aborted ? body : new Uint8Array(0));

    if (frames.length === 0 && script.hang !== true) {
      complete();
    } else {
      advancers.add(advance);
    }

    return {
      done,
      isDone: () => completed,
      outcome: () => {
        if (aborted) {
          return 'connection-error';
        }
        return completed ? (script.outcome ?? 'success') : 'in-progress';
      },
      status: () => (completed && !aborted ? (script.status ?? 200) : 0),
      data,
      text: () => decoder.decode(data()),
      getResponseHeader: (name) => {
        if (completed) {
          return findHeader(script.headers, name);
        }
        const frame = frames[Math.min(frameIndex, frames.length - 1)];
        return name.toLowerCase() === 'content-length' ? frame?.contentLength : undefined;
      },
      downloadedBytes: () => {
        if (completed) {
          return data().byteLength;
        }
        return frames[Math.min(frameIndex, frames.length - 1)]?.downloadedBytes ?? 0;
      },
      errorMessage: () => (aborted ? 'Request aborted' : script.errorMessage),
      timedOut: () => script.timedOut ?? false,
      abort: () => {
        if (completed) {
          return;
        }
        aborted = true;
        aborts += 1;
        complete();
      },
    };
  };

  const tick = (): Promise<void> => {
    for (const advance of [...advancers]) {
      advance();
    }
    return Promise.resolve();
  };

  return {
    send,
    requests,
    abortCount: () => aborts,
    tick,
  };
};

// ============================================================================
// Logger Mocks
// ============================================================================

/**
 * Logged line captured by the recording logger.
 */
export interface LoggedLine {
  readonly level: 'debug' | 'info' | 'warn' | 'error';
  readonly message: string;
  readonly meta: Readonly<Record<string, unknown>> | undefined;
}

/**
 * Creates a logger that records every call.
 */
export const createRecordingLogger = (): Logger & { readonly lines: LoggedLine[] } => {
  const lines: LoggedLine[] = [];
  const record =
    (level: LoggedLine['level']) =>
    (message: string, meta?: Readonly<Record<string, unknown>>): void => {
      lines.push({ level, message, meta });
    };

  return {
    lines,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
};
