import type { Effect } from "effect";
import type { PileEvent } from "../events.js";

export type IEventLogger = {
  onEvent: (event: PileEvent) => Effect.Effect<void>;
};
