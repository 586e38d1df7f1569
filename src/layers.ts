import { Layer } from "effect";
import type { SimulatorConfig } from "./config.js";
import { PileDriverLayer } from "./pile/pile-driver.js";
import { SimulatedClockLayer } from "./simulated-clock.js";
import { TariffLayer } from "./tariff/price-file.js";
import { WebSocketTransportLayer } from "./transport/websocket.transport.js";

export const createSimulatorLayers = (config: SimulatorConfig, pileId: string) => {
  const timeAndTariff = Layer.mergeAll(
    TariffLayer(config.pricesPath),
    SimulatedClockLayer(config.clock),
  );

  return Layer.mergeAll(
    PileDriverLayer({ id: pileId, ...config.pile }).pipe(Layer.provideMerge(timeAndTariff)),
    WebSocketTransportLayer(config.websocketUrl),
  );
};
