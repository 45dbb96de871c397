export * from "./identity/index.js";
export { createIdentityApp, startHttpServer, API_PREFIX, type HttpServerOptions } from "./server/http.js";
export { createBearerAuth, createRequestLogger, statusForError } from "./server/middleware.js";
