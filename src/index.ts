// src/index.ts

export * from "./types.js";
export * from "./errors.js";
export * from "./namespaces.js";
export * from "./config.js";
export * from "./credentials.js";
export * from "./digest.js";
export * from "./freshness.js";
export * from "./authenticator.js";
export * from "./envelope.js";
export * from "./soap.js";
export * from "./dispatcher.js";
export * from "./requestBuilder.js";
export * from "./digestCli.js";
export * from "./app.js";
