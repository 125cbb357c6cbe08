// src/requestBuilder.ts
// Client side of the UsernameToken: builds request envelopes the server accepts.
// Used by the digest CLI and by the tests.

import type { PasswordMode } from "./types.js";
import { NONCE_ENCODING_BASE64, NS, PASSWORD_TYPE } from "./namespaces.js";
import { computePasswordDigest, currentTimestamp, generateNonce } from "./digest.js";
import { escapeXml } from "./soap.js";

export interface UsernameTokenInput {
  username: string;
  password: string;
  mode?: Exclude<PasswordMode, "Unknown">;
  nonce?: string;      // base64; generated when omitted in Digest mode
  created?: string;    // defaults to now
  now?: Date;
}

export interface UsernameToken {
  username: string;
  password: string;    // digest in Digest mode
  passwordType: string;
  nonce?: string;
  created?: string;
}

export interface ActionInput {
  namespace: string;
  name: string;
  innerXml?: string;   // already-serialized children, in the same default namespace
}

export function buildUsernameToken(input: UsernameTokenInput): UsernameToken {
  if ((input.mode ?? "Digest") === "PlainText") {
    return { username: input.username, password: input.password, passwordType: PASSWORD_TYPE.text };
  }
  const nonce = input.nonce ?? generateNonce(16);
  const created = input.created ?? currentTimestamp(input.now ?? new Date());
  return {
    username: input.username,
    password: computePasswordDigest(nonce, created, input.password),
    passwordType: PASSWORD_TYPE.digest,
    nonce,
    created,
  };
}

export function renderSecurityHeader(token: UsernameToken): string {
  const nonce = token.nonce
    ? `
        <Nonce EncodingType="${NONCE_ENCODING_BASE64}">${escapeXml(token.nonce)}</Nonce>`
    : "";
  const created = token.created
    ? `
        <Created xmlns="${NS.wsu}">${escapeXml(token.created)}</Created>`
    : "";
  return `<Security s:mustUnderstand="1" xmlns="${NS.wsse}">
      <UsernameToken>
        <Username>${escapeXml(token.username)}</Username>
        <Password Type="${token.passwordType}">${escapeXml(token.password)}</Password>${nonce}${created}
      </UsernameToken>
    </Security>`;
}

export function buildRequestEnvelope(action: ActionInput, token?: UsernameToken): string {
  const header = token
    ? `
  <s:Header>
    ${renderSecurityHeader(token)}
  </s:Header>`
    : "";
  return `<?xml version="1.0" encoding="UTF-8"?>
<s:Envelope xmlns:s="${NS.soap}">${header}
  <s:Body>
    <${action.name} xmlns="${action.namespace}">${action.innerXml ?? ""}</${action.name}>
  </s:Body>
</s:Envelope>`;
}
