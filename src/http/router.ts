import { HttpMiddleware, HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform";
import { Effect, ParseResult } from "effect";
import { DEFAULT_SIMULATION_CONFIG, SERVICE_NAME, SERVICE_VERSION } from "../config.js";
import { MicrogridSimulator } from "../microgrid-simulator/index.js";
import type { SimulationConfig } from "../microgrid-simulator/types.js";
import { decodeSimulationRequest, toDefaultsResponse, toSimulationConfig } from "./schema.js";

const simulate = (config: SimulationConfig) =>
  Effect.gen(function* () {
    const simulator = yield* MicrogridSimulator;
    const result = yield* simulator.runComparison(config);
    return yield* HttpServerResponse.json(result);
  });

const simulationFailed = (err: { readonly message: string }) =>
  Effect.logError(`Simulation failed: ${err.message}`).pipe(
    Effect.as(HttpServerResponse.unsafeJson({ detail: `Simulation error: ${err.message}` }, { status: 500 }))
  );

export const ApiRouter = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/",
    HttpServerResponse.json({
      status: "online",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
    })
  ),

  HttpRouter.post(
    "/simulate",
    Effect.gen(function* () {
      const request = yield* HttpServerRequest.HttpServerRequest;
      const body = yield* request.text;
      const simulationRequest = yield* decodeSimulationRequest(body);

      return yield* simulate(toSimulationConfig(simulationRequest));
    }).pipe(
      Effect.catchTags({
        RequestError: (err) =>
          Effect.logWarning("Could not read simulation request body", err).pipe(
            Effect.as(HttpServerResponse.unsafeJson({ detail: "Unable to read request body" }, { status: 400 }))
          ),
        ParseError: (err) =>
          Effect.succeed(
            HttpServerResponse.unsafeJson(
              { detail: ParseResult.TreeFormatter.formatErrorSync(err) },
              { status: 422 }
            )
          ),
        SimulationFailed: simulationFailed,
      })
    )
  ),

  HttpRouter.get(
    "/simulate/default",
    simulate(DEFAULT_SIMULATION_CONFIG).pipe(
      Effect.catchTags({ SimulationFailed: simulationFailed })
    )
  ),

  HttpRouter.get("/config/defaults", HttpServerResponse.json(toDefaultsResponse(DEFAULT_SIMULATION_CONFIG)))
);

export const corsMiddleware = (allowedOrigins: readonly string[]) =>
  HttpMiddleware.cors({
    allowedOrigins,
    credentials: true,
  });
