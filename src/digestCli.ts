// src/digestCli.ts
// Argument handling for the digest calculator (scripts/digest.ts).

import { computePasswordDigest, currentTimestamp, generateNonce } from "./digest.js";
import { buildRequestEnvelope, buildUsernameToken } from "./requestBuilder.js";
import { NS } from "./namespaces.js";
import { asMessage } from "./errors.js";

export interface DigestCliArgs {
  nonce?: string;
  created?: string;
  password?: string;
  username?: string;
  generate: boolean;
  request: boolean;
  example: boolean;
  help: boolean;
}

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  now?: () => Date;
}

/** Known-answer inputs printed by --example. */
export const EXAMPLE_INPUT = {
  nonce: "MTIzNDU2Nzg5MDEyMzQ1Ng==",
  created: "2024-01-15T10:30:00.000Z",
  password: "admin123",
} as const;

export const USAGE = [
  "Usage:",
  "  onvif-digest --nonce <base64> --created <iso8601> --password <password>",
  "  onvif-digest --generate --password <password> [--request --username <username>]",
  "  onvif-digest --example",
  "",
  "Digest = Base64( SHA1( Base64Decode(Nonce) + Created + Password ) )",
].join("\n");

export function parseDigestArgs(argv: string[]): DigestCliArgs {
  const out: DigestCliArgs = { generate: false, request: false, example: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--nonce") out.nonce = argv[++i];
    else if (a === "--created" || a === "--date") out.created = argv[++i];
    else if (a === "--password") out.password = argv[++i];
    else if (a === "--username") out.username = argv[++i];
    else if (a === "--generate") out.generate = true;
    else if (a === "--request") out.request = true;
    else if (a === "--example") out.example = true;
    else if (a === "--help" || a === "-h") out.help = true;
  }
  return out;
}

/** Returns the process exit code. */
export function runDigestCli(argv: string[], io: CliIo): number {
  const args = parseDigestArgs(argv);
  if (args.help) {
    io.out(USAGE);
    return 0;
  }

  if (args.example) {
    io.out("Example:");
    io.out(`Password: ${EXAMPLE_INPUT.password}`);
  }

  const now = io.now ? io.now() : new Date();
  const nonce = args.example ? EXAMPLE_INPUT.nonce : args.generate ? generateNonce(16) : args.nonce;
  const created = args.example ? EXAMPLE_INPUT.created : args.generate ? currentTimestamp(now) : args.created;
  const password = args.example ? EXAMPLE_INPUT.password : args.password;

  if (!nonce || !created || !password) {
    io.err("Error: nonce, created and password are required.");
    io.err(USAGE);
    return 1;
  }

  let digest: string;
  try {
    digest = computePasswordDigest(nonce, created, password);
  } catch (e) {
    io.err(`Error computing digest: ${asMessage(e)}`);
    return 1;
  }

  io.out(`Nonce:    ${nonce}`);
  io.out(`Created:  ${created}`);
  io.out(`Digest:   ${digest}`);

  if (args.request) {
    if (!args.username) {
      io.err("Error: --request needs --username.");
      return 1;
    }
    const token = buildUsernameToken({ username: args.username, password, nonce, created });
    io.out("");
    io.out(buildRequestEnvelope({ namespace: NS.tds, name: "GetDeviceInformation" }, token));
  }
  return 0;
}
