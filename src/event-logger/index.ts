import type { IEventLogger } from "./types.js";
import { Effect, type DateTime } from "effect";
import type { PileEvent } from "../events.js";
import { totalCost } from "../pile/charge-session.js";
import { formatInZone } from "../simulated-clock.js";

export class EventLogger implements IEventLogger {
  public constructor(private readonly timeZone: DateTime.TimeZone) { }

  public onEvent(event: PileEvent) {
    return Effect.log(this.describe(event)).pipe(
      Effect.annotateLogs('simulated_time', formatInZone(event.at, this.timeZone))
    );
  }

  private describe(event: PileEvent): string {
    switch (event._tag) {
      case 'RequestQueued':
        return `Request ${event.session.request.id} waiting for ${event.session.request.requestedEnergyKwh} kWh`;
      case 'RequestCancelled':
        return `Request ${event.session.request.id} cancelled`;
      case 'RequestRejected':
        return `Request ${event.requestId} rejected: ${event.reason}`;
      case 'SessionAdmitted':
        return `Charging request ${event.session.request.id}`;
      case 'SessionProgress':
        return `Request ${event.session.request.id}: ${event.session.energyDeliveredKwh.toFixed(3)} of ${event.session.request.requestedEnergyKwh} kWh, cost ${totalCost(event.session).toFixed(2)}`;
      case 'SessionCompleted':
        return `Request ${event.session.request.id} completed: ${event.session.energyDeliveredKwh.toFixed(3)} kWh, cost ${totalCost(event.session).toFixed(2)}`;
      case 'SessionInterrupted':
        return `Request ${event.session.request.id} interrupted: ${event.session.energyDeliveredKwh.toFixed(3)} kWh, cost ${totalCost(event.session).toFixed(2)}`;
      case 'PileClosed':
        return 'Pile closed';
      case 'PileOpened':
        return 'Pile opened';
    }
  }
}
