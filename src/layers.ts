import { Layer } from "effect";
import { MicrogridSimulatorLayer } from "./microgrid-simulator/index.js";

export const serviceLayers = Layer.mergeAll(
    MicrogridSimulatorLayer,
);
