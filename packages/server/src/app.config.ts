import config from "@colyseus/tools";
import { RedisPresence } from "@colyseus/redis-presence";
import { RedisDriver } from "@colyseus/redis-driver";
import { monitor } from "@colyseus/monitor";
import { matchMaker } from "colyseus";
import express from "express";
import { isReplayId, clampListLimit } from "@ringout/replays";
import { config as envConfig } from "./config.js";
import { ArenaRoom } from "./rooms/ArenaRoom.js";
import { getReplayArchive, verifyEncodedReplay } from "./services/replays.js";

// Parse Redis URL into options object so we can disable ready check.
// Ready check sends INFO command which fails if connection is already in subscriber mode.
function parseRedisUrl(url: string) {
  const parsed = new URL(url);
  return {
    host: parsed.hostname || "localhost",
    port: parseInt(parsed.port, 10) || 6379,
    password: parsed.password || undefined,
    db: parsed.pathname ? parseInt(parsed.pathname.slice(1), 10) || 0 : 0,
    enableReadyCheck: false,
  };
}

const redisOptions = parseRedisUrl(envConfig.redisUri);

function queryLimit(raw: unknown): number {
  const limit = typeof raw === "string" ? parseInt(raw, 10) : NaN;
  return clampListLimit(Number.isFinite(limit) ? Math.min(limit, envConfig.replayListLimit) : envConfig.replayListLimit);
}

export default config({
  options: {
    presence: new RedisPresence(redisOptions),
    driver: new RedisDriver(redisOptions),
  },

  initializeGameServer: (gameServer) => {
    // Room options pick the mode: { mode: "versus" | "ai", aiTier, seed }
    gameServer.define("arena", ArenaRoom);
  },

  initializeExpress: (app) => {
    app.use(express.json({ limit: "100kb" }));

    // Colyseus monitor (dev-only): view rooms and inspect live room state.
    if (envConfig.nodeEnv !== "production") {
      app.use("/monitor", monitor());
    }

    app.get("/healthz", (_req, res) => {
      res.json({ status: "ok", timestamp: Date.now() });
    });

    // Live arenas across all processes (RedisDriver backs the query)
    app.get("/arenas", async (_req, res) => {
      try {
        const rooms = await matchMaker.query({ name: "arena" });
        const arenas = rooms.map((room) => ({
          roomId: room.roomId,
          clients: room.clients,
          maxClients: room.maxClients,
          locked: room.locked,
          metadata: room.metadata,
        }));
        res.json({ arenas, count: arenas.length, timestamp: Date.now() });
      } catch (error) {
        console.error("Error listing arenas:", error);
        res.status(500).json({ error: "Failed to list arenas" });
      }
    });

    // Newest archived matches first
    app.get("/replays", async (req, res) => {
      try {
        const replays = await getReplayArchive().list(queryLimit(req.query.limit));
        res.json({ replays, count: replays.length, timestamp: Date.now() });
      } catch (error) {
        console.error("Error listing replays:", error);
        res.status(500).json({ error: "Failed to list replays" });
      }
    });

    app.get("/replays/:id", async (req, res) => {
      try {
        const { id } = req.params;
        if (!isReplayId(id)) {
          res.status(400).json({ error: "Invalid replay id" });
          return;
        }
        const stored = await getReplayArchive().get(id);
        if (!stored) {
          res.status(404).json({ error: "Replay not found" });
          return;
        }
        // The body is already an encoded replay log; send it untouched.
        res.type("application/json").send(stored.encoded);
      } catch (error) {
        console.error("Error fetching replay:", error);
        res.status(500).json({ error: "Failed to fetch replay" });
      }
    });

    /**
     * Replay verification
     *
     * Re-simulates the stored log from its snapshot and reports whether it plays back
     * to the recorded outcome. A fault carries the kind (unplayable | desync) and tick.
     */
    app.get("/replays/:id/verify", async (req, res) => {
      try {
        const { id } = req.params;
        if (!isReplayId(id)) {
          res.status(400).json({ error: "Invalid replay id" });
          return;
        }
        const stored = await getReplayArchive().get(id);
        if (!stored) {
          res.status(404).json({ error: "Replay not found" });
          return;
        }
        const verification = verifyEncodedReplay(stored.encoded);
        if (!verification.ok) {
          console.warn(`[replays] ${id} failed verification: ${verification.fault.kind} (${verification.fault.reason})`);
        }
        res.json({ id, ...verification });
      } catch (error) {
        console.error("Error verifying replay:", error);
        res.status(500).json({ error: "Failed to verify replay" });
      }
    });
  },

  beforeListen: () => {
    console.log(`[bootstrap] Arena server starting on port ${envConfig.port}`);
    console.log(`[bootstrap] Default AI tier: ${envConfig.defaultAiTier}`);
  },
});
