// src/soap.ts
// Outbound envelopes. Handler output is already a serialized fragment; it is
// dropped into the Body as-is.

import type { SoapFaultCode } from "./types.js";
import { NS } from "./namespaces.js";

const XML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export function escapeXml(value: string | number | boolean): string {
  return String(value).replace(/[&<>"']/g, (c) => XML_ESCAPES[c] ?? c);
}

export function wrapSuccess(bodyContent: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<soap:Envelope xmlns:soap="${NS.soap}" xmlns:tds="${NS.tds}" xmlns:trt="${NS.trt}" xmlns:tptz="${NS.tptz}" xmlns:tt="${NS.tt}">
  <soap:Body>${bodyContent}
  </soap:Body>
</soap:Envelope>`;
}

export function wrapFault(code: SoapFaultCode, reason: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<soap:Envelope xmlns:soap="${NS.soap}">
  <soap:Body>
    <soap:Fault>
      <soap:Code>
        <soap:Value>soap:${code}</soap:Value>
      </soap:Code>
      <soap:Reason>
        <soap:Text xml:lang="en">${escapeXml(reason)}</soap:Text>
      </soap:Reason>
    </soap:Fault>
  </soap:Body>
</soap:Envelope>`;
}

export const AUTH_FAULT_REASON = "Authentication failed";

export function authenticationFault(): string {
  return wrapFault("Sender", AUTH_FAULT_REASON);
}
