import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import crypto from "crypto";
import { rateLimit } from "express-rate-limit";
import type { ActionRequest, HandlerResult, Logger, ServerConfig, ServiceName } from "./types.js";
import { SERVICE_NAMES } from "./types.js";
import { CredentialStore } from "./credentials.js";
import { Authenticator } from "./authenticator.js";
import { ActionDispatcher } from "./dispatcher.js";
import { readEnvelope } from "./envelope.js";
import { authenticationFault, wrapFault, wrapSuccess } from "./soap.js";
import { SOAP_CONTENT_TYPE } from "./namespaces.js";
import { serviceXAddr } from "./handlers/device.js";
import { asMessage } from "./errors.js";

export const SERVER_NAME = "ONVIF Service Server";
export const SERVER_VERSION = "1.0.0";

export const SERVICE_PATHS: Readonly<Record<ServiceName, string>> = {
  Device: "/onvif/device_service",
  Media: "/onvif/media_service",
  PTZ: "/onvif/ptz_service",
};

export interface OnvifAppDeps {
  logger?: Logger;
  clock?: () => Date;
  store?: CredentialStore;
  dispatcher?: ActionDispatcher;
}

function requestIdOf(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : "unknown";
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const status = err.status;
  return typeof status === "number" ? status : undefined;
}

function sendSoap(res: Response, status: number, xml: string): void {
  res.status(status).type(SOAP_CONTENT_TYPE).send(xml);
}

function deviceWsdl(cfg: ServerConfig): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<definitions xmlns="http://schemas.xmlsoap.org/wsdl/"
             xmlns:soap="http://schemas.xmlsoap.org/wsdl/soap12/"
             xmlns:tds="http://www.onvif.org/ver10/device/wsdl"
             targetNamespace="http://www.onvif.org/ver10/device/wsdl">
  <types/>
  <message name="GetDeviceInformationRequest"/>
  <message name="GetDeviceInformationResponse"/>
  <portType name="Device">
    <operation name="GetDeviceInformation">
      <input message="tds:GetDeviceInformationRequest"/>
      <output message="tds:GetDeviceInformationResponse"/>
    </operation>
  </portType>
  <binding name="DeviceBinding" type="tds:Device"/>
  <service name="DeviceService">
    <port name="DevicePort" binding="tds:DeviceBinding">
      <soap:address location="${serviceXAddr(cfg, "device_service")}"/>
    </port>
  </service>
</definitions>`;
}

export function createOnvifApp(cfg: ServerConfig, deps: OnvifAppDeps = {}): Express {
  const logger = deps.logger ?? console;
  const clock = deps.clock ?? (() => new Date());
  const store = deps.store ?? new CredentialStore(cfg.principals);
  const authenticator = new Authenticator(store, { clock });
  const dispatcher = deps.dispatcher ?? new ActionDispatcher(cfg);

  const app = express();
  app.disable("x-powered-by");

  /**
   * ------------------------------------------------------------
   * Request ID middleware
   * ------------------------------------------------------------
   */
  app.use((_req: Request, res: Response, next: NextFunction) => {
    const requestId = crypto.randomUUID();
    res.setHeader("x-onvif-request-id", requestId);
    res.locals.requestId = requestId;
    next();
  });

  /**
   * ------------------------------------------------------------
   * Health / info
   * ------------------------------------------------------------
   */
  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "healthy", service: "ONVIF Server" });
  });

  app.get("/", (_req: Request, res: Response) => {
    res.json({
      service: SERVER_NAME,
      version: SERVER_VERSION,
      endpoints: {
        device_service: SERVICE_PATHS.Device,
        media_service: SERVICE_PATHS.Media,
        ptz_service: SERVICE_PATHS.PTZ,
      },
      authentication: "WS-Security UsernameToken (PasswordDigest or PasswordText)",
      supported_operations: {
        device: dispatcher.supportedActions("Device"),
        media: dispatcher.supportedActions("Media"),
        ptz: dispatcher.supportedActions("PTZ"),
      },
    });
  });

  app.get(SERVICE_PATHS.Device, (_req: Request, res: Response) => {
    res.status(200).type("text/xml").send(deviceWsdl(cfg));
  });

  /**
   * ------------------------------------------------------------
   * Per-client rate limiter (service endpoints only)
   * ------------------------------------------------------------
   */
  const limiter = rateLimit({
    windowMs: cfg.rateLimit.windowSeconds * 1000,
    limit: cfg.rateLimit.max,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    handler: (_req: Request, res: Response) => {
      res.status(429).json({
        status: "error",
        reason: "rate_limit_exceeded",
        requestId: requestIdOf(res),
      });
    },
  });

  const readBody = express.text({ type: () => true, limit: cfg.maxBody });

  /**
   * ------------------------------------------------------------
   * SOAP service endpoints
   * ------------------------------------------------------------
   */
  function serviceEndpoint(service: ServiceName): RequestHandler {
    return (req: Request, res: Response) => {
      const requestId = requestIdOf(res);
      const raw: unknown = req.body;
      const xml = typeof raw === "string" ? raw : "";

      // single clock read per request
      const now = clock();

      const envelope = readEnvelope(xml);
      if (!envelope.ok) {
        logger.warn(`[HTTP] ${service} ${requestId} envelope rejected: ${envelope.reason}`);
      }

      const outcome = authenticator.evaluate(envelope.credentials, now);
      if (!outcome.ok) {
        logger.warn(
          `[AUTH] ${service} ${requestId} rejected: ${outcome.reason} user=${outcome.identifier ?? "-"}`
        );
        return sendSoap(res, 401, authenticationFault());
      }

      if (!envelope.action) {
        return res.status(400).json({
          status: "error",
          reason: "missing_action",
          detail: "Request body carries no action element",
          requestId,
        });
      }

      const request: ActionRequest = {
        serviceName: service,
        actionName: envelope.action.name,
        namespace: envelope.action.namespace,
        bodyElement: envelope.action.element,
      };

      let result: HandlerResult;
      try {
        result = dispatcher.dispatch(request.serviceName, request.actionName, request.bodyElement, now);
      } catch (e) {
        logger.error(`[DISPATCH] ${service}.${request.actionName} ${requestId} failed:`, asMessage(e));
        return sendSoap(res, 500, wrapFault("Receiver", "Internal error"));
      }

      if (result.kind === "unsupported") {
        logger.warn(`[DISPATCH] ${service} ${requestId} unsupported action: ${result.actionName}`);
        return res.status(400).json({
          status: "error",
          reason: "unsupported_action",
          detail: `Unsupported action: ${result.actionName}`,
          requestId,
        });
      }

      logger.log(`[DISPATCH] ${service}.${request.actionName} ${requestId} user=${outcome.principal.identifier}`);
      return sendSoap(res, 200, wrapSuccess(result.body));
    };
  }

  for (const service of SERVICE_NAMES) {
    app.post(SERVICE_PATHS[service], limiter, readBody, serviceEndpoint(service));
  }

  /**
   * ------------------------------------------------------------
   * Body read errors (size limit, charset)
   * ------------------------------------------------------------
   */
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const status = httpStatusOf(err);
    if (status === undefined || status < 400 || status >= 500) return next(err);
    logger.warn(`[HTTP] ${requestIdOf(res)} request rejected: ${asMessage(err)}`);
    return res.status(status).json({
      status: "error",
      reason: "invalid_request_body",
      requestId: requestIdOf(res),
    });
  });

  /**
   * ------------------------------------------------------------
   * Catch-all
   * ------------------------------------------------------------
   */
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ status: "error", reason: "not_found" });
  });

  return app;
}
