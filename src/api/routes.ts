import type {
  FastifyInstance,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from "fastify";
import type { GameBridge } from "../core/game-bridge.js";
import type { Logger } from "../logger.js";
import { isUserIntent, toGameSnapshot } from "../ws/protocol.js";

export type BridgeServer = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression,
  RawReplyDefaultExpression,
  Logger
>;

export async function registerRoutes<TImage>(app: BridgeServer, deps: { bridge: GameBridge<TImage> }): Promise<void> {
  const { bridge } = deps;

  app.get("/health", async () => ({ ok: true }));

  app.get("/api/status", async () => bridge.status());

  app.get("/api/games", async () => bridge.registry.list().map(toGameSnapshot));

  app.get<{ Params: { id: string } }>("/api/games/:id", async (request, reply) => {
    const entity = bridge.registry.get(request.params.id);
    if (!entity) {
      reply.code(404);
      return { error: `Game not found: ${request.params.id}` };
    }
    return toGameSnapshot(entity);
  });

  app.get<{ Params: { id: string } }>("/api/games/:id/cover", async (request, reply) => {
    const cover = bridge.covers.getCover(request.params.id);
    if (!cover) {
      reply.code(404);
      return { error: `No cover for game: ${request.params.id}` };
    }
    reply
      .header("content-type", cover.contentType)
      .header("etag", `"${cover.digest}"`)
      .header("x-cover-quality", String(cover.quality));
    return cover.bytes;
  });

  app.post<{ Params: { id: string }; Body: { action?: unknown } | undefined }>(
    "/api/games/:id/command",
    async (request, reply) => {
      const action = request.body?.action;
      if (!isUserIntent(action)) {
        reply.code(400);
        return { error: `Unknown action: ${String(action)}` };
      }
      if (!bridge.dispatcher.request(request.params.id, action)) {
        reply.code(404);
        return { error: `Game not found: ${request.params.id}` };
      }
      const entity = bridge.registry.get(request.params.id);
      reply.code(202);
      return entity ? toGameSnapshot(entity) : { id: request.params.id };
    },
  );

  app.post("/api/library/refresh", async (_request, reply) => {
    bridge.dispatcher.requestLibraryRefresh();
    reply.code(202);
    return { requested: true };
  });
}
