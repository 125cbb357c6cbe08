// src/server.ts
// Simulated ONVIF device: device / media / PTZ services behind WS-Security
// UsernameToken authentication.
//
// Public endpoints:
//   GET  /health
//   GET  /
//   GET  /onvif/device_service   (WSDL stub)
//   POST /onvif/device_service
//   POST /onvif/media_service
//   POST /onvif/ptz_service
//
// Invariants:
// - Every request re-proves identity; nothing is cached between requests.
// - Credential store and action tables are read-only after boot.

import type { ServerConfig } from "./types.js";
import { describeConfig, loadServerConfigFromEnv } from "./config.js";
import { createOnvifApp, SERVICE_PATHS } from "./app.js";
import { asMessage } from "./errors.js";

let cfg: ServerConfig;
try {
  cfg = loadServerConfigFromEnv();
} catch (e) {
  // Deliberately crash on config error: fail-closed at deployment.
  console.error("[BOOT] config error:", asMessage(e));
  process.exit(1);
}

const app = createOnvifApp(cfg);

app.listen(cfg.port, cfg.host, () => {
  console.log("[BOOT] onvif-sim-server listening");
  console.log("[BOOT] address:", `${cfg.host}:${cfg.port}`);
  console.log("[BOOT] users:", cfg.principals.map((p) => `${p.identifier} (${p.role})`).join(", "));
  console.log("[BOOT] device service:", `${cfg.publicBaseUrl}${SERVICE_PATHS.Device}`);
  console.log("[BOOT] media service:", `${cfg.publicBaseUrl}${SERVICE_PATHS.Media}`);
  console.log("[BOOT] ptz service:", `${cfg.publicBaseUrl}${SERVICE_PATHS.PTZ}`);
  console.log("[BOOT] configFingerprint:", describeConfig(cfg));
});
