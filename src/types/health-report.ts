export type HealthReportMode = 'full' | 'compact';

export interface EndpointCheckResult {
  name: string;
  url: string;
  /** HTTP status, or 0 when no response arrived. */
  code: number;
  ok: boolean;
  body_snippet: string;
}

export interface SmokeCheckResult {
  name: string;
  code: number;
  ok: boolean;
  body_snippet: string;
}

export interface HealthReport {
  timestamp_utc: string;
  mode: HealthReportMode;
  ok: boolean;
  stack: {
    public_port: number;
    reasoning_url: string;
    multimodal_url: string;
    reasoning_model: string;
    multimodal_model: string;
  };
  endpoint_checks: EndpointCheckResult[];
  smoke_checks: SmokeCheckResult[];
}
