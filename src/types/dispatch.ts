export type ModelRole = 'reasoning' | 'multimodal';

export interface ModelIdentity {
  role: ModelRole;
  canonicalId: string;
  alias: string;
  /** Base URL of the backend, without a trailing slash. */
  backendEndpoint: string;
}

export type RouteDecisionSource = 'shortcut' | 'mlp_compat';

export interface RouteDecision {
  targetModel: ModelIdentity;
  confidence: number;
  source: RouteDecisionSource;
  /** Keyed by canonical model id; always exactly the two known models. */
  probabilities: Record<string, number>;
  /** Canonical ids, best first. */
  rankedCandidates: string[];
}

export interface ModelListEntry {
  id: string;
  object: 'model';
  owned_by: 'nvidia' | 'local';
}

export interface ModelList {
  object: 'list';
  data: ModelListEntry[];
}

// ── Outbound chat payloads ──────────────────────────────────────────────────

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface ChatMessage {
  role: 'user';
  content: string | ChatContentPart[];
}

export interface ChatCompletionPayload {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
}

// ── Forward results ─────────────────────────────────────────────────────────

export interface InvokeRequest {
  text: string;
  model: string;
  imageUrl?: string;
  imagePath?: string;
}

export interface WorkerResultDetails {
  text: string;
  used_precision: 'runtime';
  raw: unknown;
}

export type InvokeResult =
  | { ok: true; result: WorkerResultDetails }
  | { ok: false; error: string };

export interface RelayRequest {
  backend: string;
  /** Inbound path, appended verbatim to the backend base URL. */
  path: string;
  method: string;
  body: Buffer;
  authorization?: string;
}

/** Outcome of a passthrough relay. Transport failures are folded into a 502. */
export interface ForwardResult {
  ok: boolean;
  statusCode: number;
  body: Buffer;
  contentType: string;
  error?: string;
}

// ── /route response ─────────────────────────────────────────────────────────

export type WorkerResponse =
  | { details: { target_model: string; target_alias: string; result: WorkerResultDetails } }
  | { details: { error: string } };

export interface RouteResponseBody {
  model: string;
  confidence: number;
  source: RouteDecisionSource;
  probabilities: Record<string, number>;
  top_k_models: string[];
  dispatch_target: string;
  dispatch_backend: string;
  worker_invoked: true;
  worker_status: string;
  worker_response: WorkerResponse;
}
