// src/dispatcher.ts

import type {
  ActionTables,
  DeviceConfig,
  HandlerResult,
  ServiceName,
} from "./types.js";
import { DEVICE_ACTIONS } from "./handlers/device.js";
import { MEDIA_ACTIONS } from "./handlers/media.js";
import { PTZ_ACTIONS } from "./handlers/ptz.js";

export const DEFAULT_ACTION_TABLES: ActionTables = {
  Device: DEVICE_ACTIONS,
  Media: MEDIA_ACTIONS,
  PTZ: PTZ_ACTIONS,
};

/**
 * Closed per-service action tables. Anything not in a table is Unsupported;
 * the HTTP layer turns that into a 400, never a 401.
 */
export class ActionDispatcher {
  constructor(
    private readonly config: DeviceConfig,
    private readonly tables: ActionTables = DEFAULT_ACTION_TABLES
  ) {}

  supportedActions(service: ServiceName): string[] {
    return [...this.tables[service].keys()];
  }

  dispatch(
    service: ServiceName,
    actionName: string,
    paramElement: Element,
    now: Date = new Date()
  ): HandlerResult {
    const handler = this.tables[service].get(actionName);
    if (!handler) return { kind: "unsupported", actionName };
    return { kind: "body", body: handler(paramElement, { config: this.config, now }) };
  }
}
