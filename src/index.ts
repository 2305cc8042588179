/**
 * jidkit -- JID addresses for federated messaging.
 *
 * Top-level package exports: JID, its errors and codecs, configuration.
 */

export * from "./protocol/index.js";
export * from "./sdk/index.js";
