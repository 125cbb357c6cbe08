// src/envelope.ts
// Namespace-aware reader for inbound SOAP envelopes.
//
// Every lookup is by (namespace URI, local name). Clients bind wsse/wsu/soap
// to whatever prefixes they like, or use default namespaces; the prefix is
// never consulted.
//
//   Envelope
//     Header
//       wsse:Security
//         wsse:UsernameToken
//           wsse:Username
//           wsse:Password  @Type
//           wsse:Nonce
//           wsu:Created            <- utility namespace, not secext
//     Body
//       <action>                   <- first element child

import { DOMParser } from "@xmldom/xmldom";
import type { ActionBody, Credentials, EnvelopeReadResult, PasswordMode } from "./types.js";
import { NS, SOAP_ENVELOPE_NAMESPACES } from "./namespaces.js";
import { EnvelopeError } from "./errors.js";

export interface QualifiedName {
  namespaceURI: string;
  localName: string;
}

export function isElement(node: Node | null | undefined): node is Element {
  return !!node && node.nodeType === 1;
}

/** Drops the prefix: "wsse:Security" bound to secext becomes {secext, "Security"}. */
export function qualifiedName(el: Element): QualifiedName {
  const tag = el.tagName;
  const colon = tag.indexOf(":");
  return {
    namespaceURI: el.namespaceURI ?? "",
    localName: el.localName || (colon >= 0 ? tag.slice(colon + 1) : tag),
  };
}

export function hasName(el: Element, namespaceURI: string, localName: string): boolean {
  const q = qualifiedName(el);
  return q.namespaceURI === namespaceURI && q.localName === localName;
}

export function elementChildren(parent: Element): Element[] {
  const out: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const n = nodes.item(i);
    if (isElement(n)) out.push(n);
  }
  return out;
}

export function findChild(parent: Element, namespaceURI: string, localName: string): Element | null {
  return elementChildren(parent).find((c) => hasName(c, namespaceURI, localName)) ?? null;
}

export function findDescendant(parent: Element, namespaceURI: string, localName: string): Element | null {
  return parent.getElementsByTagNameNS(namespaceURI, localName).item(0);
}

export function textOf(el: Element | null): string | undefined {
  if (!el) return undefined;
  return el.textContent ?? "";
}

const RESERVED_PREFIXES = new Set(["xml", "xmlns"]);

/** First prefixed element or attribute whose prefix has no namespace binding. */
function findUnboundPrefix(el: Element): string | null {
  if (el.prefix && !el.namespaceURI) return el.tagName;
  const attrs = el.attributes;
  for (let i = 0; i < attrs.length; i++) {
    const attr = attrs.item(i);
    if (attr?.prefix && !RESERVED_PREFIXES.has(attr.prefix) && !attr.namespaceURI) return attr.name;
  }
  for (const child of elementChildren(el)) {
    const unbound = findUnboundPrefix(child);
    if (unbound !== null) return unbound;
  }
  return null;
}

/**
 * Strict parse: any parser complaint (warning included) fails the document,
 * and so does a prefix with no namespace in scope.
 */
export function parseXml(xml: string): Document {
  const parser = new DOMParser({
    errorHandler: (level: string, msg: unknown) => {
      throw new EnvelopeError("xml_parse_" + level, { message: String(msg) });
    },
  });
  const doc = parser.parseFromString(xml, "text/xml");
  if (!doc || !isElement(doc.documentElement)) throw new EnvelopeError("xml_no_document_element");
  const unbound = findUnboundPrefix(doc.documentElement);
  if (unbound !== null) throw new EnvelopeError("xml_unbound_prefix", { name: unbound });
  return doc;
}

export function passwordModeOf(typeAttr: string | null | undefined): PasswordMode {
  const t = typeAttr ?? "";
  if (t.includes("PasswordDigest")) return "Digest";
  if (!t || t.includes("PasswordText")) return "PlainText";
  return "Unknown";
}

export function readCredentials(envelope: Element): Credentials | null {
  const header = SOAP_ENVELOPE_NAMESPACES.map((ns) => findChild(envelope, ns, "Header")).find(
    (h): h is Element => h !== null
  );
  if (!header) return null;

  const security = findChild(header, NS.wsse, "Security");
  if (!security) return null;

  const token = findDescendant(security, NS.wsse, "UsernameToken");
  if (!token) return null;

  const username = findDescendant(token, NS.wsse, "Username");
  const password = findDescendant(token, NS.wsse, "Password");
  if (!username || !password) return null;

  const nonce = textOf(findDescendant(token, NS.wsse, "Nonce"));
  const created = textOf(findDescendant(token, NS.wsu, "Created"));

  return {
    identifier: textOf(username) ?? "",
    mode: passwordModeOf(password.getAttribute("Type")),
    presentedSecret: textOf(password) ?? "",
    ...(nonce !== undefined ? { nonce } : {}),
    ...(created !== undefined ? { created } : {}),
  };
}

export function readAction(envelope: Element): ActionBody | null {
  const q = qualifiedName(envelope);
  const body = findChild(envelope, q.namespaceURI, "Body");
  if (!body) return null;

  const first = elementChildren(body)[0];
  if (!first) return null;

  const name = qualifiedName(first);
  return { name: name.localName, namespace: name.namespaceURI, element: first };
}

export function readEnvelope(xml: string): EnvelopeReadResult {
  let doc: Document;
  try {
    doc = parseXml(xml);
  } catch {
    return { ok: false, reason: "unparsable_envelope", credentials: null, action: null };
  }

  const root = doc.documentElement;
  const q = qualifiedName(root);
  if (q.localName !== "Envelope" || !SOAP_ENVELOPE_NAMESPACES.includes(q.namespaceURI)) {
    return { ok: false, reason: "not_a_soap_envelope", credentials: null, action: null };
  }

  return { ok: true, credentials: readCredentials(root), action: readAction(root) };
}
