/**
 * @concord/node: HTTP peer node.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, parsePeers, ConfigSchema } from "./config.js";
export type { AppConfig, PeerEntry } from "./config.js";
export { HttpPeerTransport, PEER_ID_HEADER } from "./transport/http-transport.js";
export type { FetchFn, HttpPeerTransportOptions } from "./transport/http-transport.js";
export { buildNode, createLedgerClient } from "./node.js";
export type { NodeComponents } from "./node.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
