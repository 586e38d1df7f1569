import { Effect, Layer } from "effect";
import { Socket } from "@effect/platform";
import { Transport } from "./types.js";
import { TransportError } from "../errors/transport.error.js";

const decoder = new TextDecoder();

export const WebSocketTransportLayer = (url: string): Layer.Layer<Transport, never, Socket.WebSocketConstructor> =>
  Layer.scoped(
    Transport,
    Effect.gen(function* () {
      const socket = yield* Socket.makeWebSocket(url);
      const write = yield* socket.writer;

      return {
        send: (message: string) => write(message).pipe(
          Effect.mapError((cause) => new TransportError({ message: `Failed to send to ${url}`, cause }))
        ),
        run: (onMessage: (message: string) => Effect.Effect<void>) => socket.runRaw(
          (data) => onMessage(typeof data === "string" ? data : decoder.decode(data))
        ).pipe(
          Effect.tap(() => Effect.log(`Connection to ${url} closed`)),
          Effect.mapError((cause) => new TransportError({ message: `Connection to ${url} failed: ${cause.message}`, cause }))
        ),
      };
    })
  );
