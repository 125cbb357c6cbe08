// src/types.ts

/* -------------------------------------------------------
 * Principals / credentials
 * ----------------------------------------------------- */

export type PrincipalRole = "Administrator" | "User";

export interface Principal {
  readonly identifier: string;
  readonly secret: string;
  readonly role: PrincipalRole;
}

export type PasswordMode = "Digest" | "PlainText" | "Unknown";

export interface Credentials {
  identifier: string;
  mode: PasswordMode;
  presentedSecret: string;   // digest value (Digest) or the password itself (PlainText)
  nonce?: string;            // base64, as presented
  created?: string;          // wsu:Created, as presented
}

export interface AuthDecision {
  accepted: boolean;
  principal?: string;
}

export type AuthFailureReason =
  | "missing_credentials"
  | "unknown_principal"
  | "malformed_credential"
  | "stale_timestamp"
  | "digest_mismatch"
  | "plaintext_mismatch"
  | "unsupported_password_type";

// Internal only: the reason never leaves the server.
export type AuthOutcome =
  | { ok: true; principal: Principal }
  | { ok: false; reason: AuthFailureReason; identifier?: string };

/* -------------------------------------------------------
 * Envelope / actions
 * ----------------------------------------------------- */

export type ServiceName = "Device" | "Media" | "PTZ";

export const SERVICE_NAMES: readonly ServiceName[] = ["Device", "Media", "PTZ"];

export interface ActionBody {
  name: string;
  namespace: string;
  element: Element;
}

export interface ActionRequest {
  readonly serviceName: ServiceName;
  readonly actionName: string;
  readonly namespace: string;
  readonly bodyElement: Element;
}

export type EnvelopeFailureReason = "unparsable_envelope" | "not_a_soap_envelope";

export type EnvelopeReadResult =
  | { ok: true; credentials: Credentials | null; action: ActionBody | null }
  | { ok: false; reason: EnvelopeFailureReason; credentials: null; action: null };

export type HandlerResult =
  | { kind: "body"; body: string }
  | { kind: "unsupported"; actionName: string };

export type SoapFaultCode = "Sender" | "Receiver";

/* -------------------------------------------------------
 * Device configuration
 * ----------------------------------------------------- */

export interface DeviceInfo {
  manufacturer: string;
  model: string;
  firmwareVersion: string;
  serialNumber: string;
  hardwareId: string;
}

export interface VideoEncoderSettings {
  encoding: string;
  width: number;
  height: number;
  framerate: number;
  bitrate: number;
}

export interface AudioEncoderSettings {
  encoding: string;
  bitrate: number;
  sampleRate: number;
}

export interface MediaProfile {
  token: string;
  name: string;
  video: VideoEncoderSettings;
  audio?: AudioEncoderSettings;
}

export interface DeviceConfig {
  device: DeviceInfo;
  profiles: readonly MediaProfile[];
  publicBaseUrl: string;     // used for XAddr values
  rtspBaseUrl: string;       // stream URIs are <rtspBaseUrl>/<profileToken>
}

export interface HandlerContext {
  config: DeviceConfig;
  now: Date;
}

export type ActionHandler = (params: Element, ctx: HandlerContext) => string;

export type ActionTable = ReadonlyMap<string, ActionHandler>;

export type ActionTables = Readonly<Record<ServiceName, ActionTable>>;

/* -------------------------------------------------------
 * Server configuration
 * ----------------------------------------------------- */

export interface RateLimitConfig {
  windowSeconds: number;
  max: number;
}

export interface ServerConfig extends DeviceConfig {
  host: string;
  port: number;
  maxBody: string;
  rateLimit: RateLimitConfig;
  principals: readonly Principal[];
}

export type Logger = Pick<Console, "log" | "warn" | "error">;
