import type {
  ChatCompletionPayload,
  ChatMessage,
  ForwardResult,
  InvokeRequest,
  InvokeResult,
  RelayRequest,
} from '../types/dispatch.js';
import type { BackendResolver } from './backend-resolver.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

export const DISPATCH_TIMEOUT_MS = 600_000;
export const ROUTE_MAX_TOKENS = 256;
const DEFAULT_CONTENT_TYPE = 'application/json';
const ERROR_SNIPPET_CHARS = 300;
const METHODS_WITHOUT_BODY = new Set(['GET', 'HEAD']);

export interface DispatchForwarderOptions {
  timeoutMs?: number;
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

/** `choices[0].message.content`, or '' when any step is missing or the wrong shape. */
export function extractCompletionText(decoded: unknown): string {
  if (!isObjectRecord(decoded) || !Array.isArray(decoded.choices)) {
    return '';
  }
  const choice: unknown = decoded.choices[0];
  if (!isObjectRecord(choice) || !isObjectRecord(choice.message)) {
    return '';
  }
  const content = choice.message.content;
  return typeof content === 'string' ? content : '';
}

/**
 * Relays requests to the inference backends.
 *
 * Backend failures never escape as exceptions: auto-route invocations resolve
 * to `{ ok: false, error }` and passthrough relays fold transport errors into
 * a synthesized 502.
 */
export class DispatchForwarder {
  readonly #resolver: BackendResolver;
  readonly #timeoutMs: number;

  constructor(resolver: BackendResolver, options: DispatchForwarderOptions = {}) {
    this.#resolver = resolver;
    this.#timeoutMs = options.timeoutMs ?? DISPATCH_TIMEOUT_MS;
  }

  buildChatPayload(request: InvokeRequest): ChatCompletionPayload {
    const isMultimodal = this.#resolver.isMultimodal(request.model);
    let message: ChatMessage;

    if (isMultimodal && request.imageUrl) {
      message = {
        role: 'user',
        content: [
          { type: 'text', text: request.text },
          { type: 'image_url', image_url: { url: request.imageUrl } },
        ],
      };
    } else if (isMultimodal && request.imagePath) {
      // No binary upload: the backend only gets the path as a textual hint.
      message = { role: 'user', content: `${request.text}\n\nimage_path hint: ${request.imagePath}` };
    } else {
      message = { role: 'user', content: request.text };
    }

    return { model: request.model, messages: [message], max_tokens: ROUTE_MAX_TOKENS };
  }

  /** Auto-route call: POST a chat completion and pull out the reply text. */
  async invoke(request: InvokeRequest): Promise<InvokeResult> {
    const backend = this.#resolver.resolve(request.model);
    if (backend === null) {
      return { ok: false, error: `unknown model: ${request.model}` };
    }

    const payload = this.buildChatPayload(request);
    try {
      const response = await fetch(`${backend}/v1/chat/completions`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.#timeoutMs),
      });

      if (response.status !== 200) {
        // Drain the error body so the connection goes back to the pool.
        const errorText = await response.text();
        void logThought(
          `[Dispatch] ${request.model} answered HTTP ${response.status} on auto-route: ` +
            scrubSensitiveText(errorText.slice(0, ERROR_SNIPPET_CHARS)),
        );
        return { ok: false, error: `backend status ${response.status}` };
      }

      const decoded: unknown = JSON.parse(await response.text());
      return {
        ok: true,
        result: {
          text: extractCompletionText(decoded),
          used_precision: 'runtime',
          raw: decoded,
        },
      };
    } catch (error) {
      const detail = scrubSensitiveText(describeError(error));
      void logThought(`[Dispatch] Auto-route call to ${backend} failed: ${detail}`);
      return { ok: false, error: detail };
    }
  }

  /**
   * Passthrough relay: forward the untouched body and hand back the upstream
   * status, content type and bytes, error responses included.
   */
  async relay(request: RelayRequest): Promise<ForwardResult> {
    const url = `${request.backend}${request.path}`;
    const method = request.method.toUpperCase();
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (request.authorization) {
      headers.Authorization = request.authorization;
    }

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: METHODS_WITHOUT_BODY.has(method) ? undefined : request.body,
        signal: AbortSignal.timeout(this.#timeoutMs),
      });
      const body = Buffer.from(await response.arrayBuffer());

      return {
        ok: response.ok,
        statusCode: response.status,
        body,
        contentType: response.headers.get('content-type') ?? DEFAULT_CONTENT_TYPE,
      };
    } catch (error) {
      const detail = scrubSensitiveText(describeError(error));
      void logThought(`[Dispatch] Passthrough to ${url} failed: ${detail}`);
      return {
        ok: false,
        statusCode: 502,
        body: Buffer.from(JSON.stringify({ error: `Upstream failure: ${detail}` })),
        contentType: DEFAULT_CONTENT_TYPE,
        error: detail,
      };
    }
  }
}
