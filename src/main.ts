import { createServer } from "node:http";
import { HttpServer } from "@effect/platform";
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node";
import { Effect, Layer, Logger } from "effect";
import { AppConfig } from "./config.js";
import { ApiRouter, corsMiddleware } from "./http/router.js";
import { serviceLayers } from "./layers.js";

const HttpLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const port = yield* AppConfig.server.port;
    const corsAllowedOrigins = yield* AppConfig.server.corsAllowedOrigins;

    yield* Effect.logDebug('Allowing cross-origin requests from', corsAllowedOrigins);

    return ApiRouter.pipe(
      HttpServer.serve(corsMiddleware(corsAllowedOrigins)),
      HttpServer.withLogAddress,
      Layer.provide(serviceLayers),
      Layer.provide(NodeHttpServer.layer(createServer, { port })),
    );
  })
);

const program = Effect.gen(function* () {
  const logLevel = yield* AppConfig.logLevel;

  return yield* Layer.launch(HttpLive).pipe(
    Logger.withMinimumLogLevel(logLevel),
  );
});

NodeRuntime.runMain(program);
