import { Room, Client, type Delayed } from "colyseus";
import { ArenaState } from "./schema/ArenaState.js";
import {
  PROTOCOL_VERSION,
  parseInputMessage,
  parseRoomOptions,
  type ArenaInitDto,
  type ArenaRoomOptions,
  type MatchAbortedDto,
  type MatchEndedDto,
  type RoundStartedDto,
  type SeriesEndedDto,
  type TickEventsDto,
} from "./protocol.js";
import { Series } from "./series.js";
import { config } from "../config.js";
import { archiveMatch, getReplayArchive } from "../services/replays.js";

import { createArenaConfig, tickMs, type ArenaConfig } from "./sim/config.js";
import { HumanController, createController, type ActorController } from "./sim/controllers.js";
import type { EngineTickResult } from "./sim/events.js";
import { Match } from "./sim/match.js";
import type { Slot } from "./sim/state.js";

function randomSeed(): number {
  return Math.floor(Math.random() * 0x1_0000_0000) >>> 0;
}

/**
 * One authoritative best-of-N series between two actors, one match per round.
 *
 * - "versus": two clients, slots 0 and 1
 * - "ai": one client on slot 0 against an AI on slot 1
 *
 * The first round starts when the last human slot is filled and the room locks; later
 * rounds follow after a short intermission. Any human leaving ends the series, aborting
 * a round in progress. Every round is archived as its own replay.
 */
export class ArenaRoom extends Room<ArenaState> {
  maxClients = 2;

  private roomOptions: ArenaRoomOptions = { mode: "versus", aiTier: config.defaultAiTier, bestOf: 1 };
  private arenaConfig: ArenaConfig = createArenaConfig();
  private series = new Series(1);
  private match: Match | null = null;
  // Set once the current round has been archived and reported.
  private roundClosed = false;
  private intermission: Delayed | null = null;
  private finished = false;

  private readonly humans: [HumanController, HumanController] = [new HumanController(), new HumanController()];
  private readonly slotBySession = new Map<string, Slot>();

  onCreate(options: unknown) {
    this.roomOptions = parseRoomOptions(options, config.defaultAiTier);
    this.series = new Series(this.roomOptions.bestOf);
    this.maxClients = Math.min(config.maxClients, this.humanSlots().length);

    this.setState(new ArenaState());
    this.state.mode = this.roomOptions.mode;
    this.state.tickRate = this.arenaConfig.tickRate;
    this.state.radius = this.arenaConfig.platform.startRadius;
    this.state.applyStanding(this.series.standing());

    this.onMessage("input", (client, message: unknown) => {
      this.handleInput(client, message);
    });

    this.refreshMetadata();
    console.log(
      `[ArenaRoom] ${this.roomId} created (${this.roomOptions.mode}, ai ${this.roomOptions.aiTier}, best of ${this.roomOptions.bestOf})`,
    );
  }

  onJoin(client: Client) {
    if (this.match) {
      throw new Error("Match already in progress");
    }
    const slot = this.humanSlots().find((s) => ![...this.slotBySession.values()].includes(s));
    if (slot === undefined) {
      throw new Error("Arena is full");
    }

    this.slotBySession.set(client.sessionId, slot);
    const actor = this.state.actors[slot];
    if (actor) {
      actor.sessionId = client.sessionId;
      actor.controller = "human";
    }
    this.sendInit(client, slot);
    console.log(`[ArenaRoom] ${client.sessionId} joined slot ${slot}`);

    if (this.slotBySession.size === this.humanSlots().length) {
      void this.lock();
      this.startRound();
    }
  }

  async onLeave(client: Client, consented: boolean) {
    const slot = this.slotBySession.get(client.sessionId);
    this.slotBySession.delete(client.sessionId);
    if (slot === undefined) return;

    this.humans[slot].releaseAll();
    console.log(`[ArenaRoom] ${client.sessionId} left slot ${slot}${consented ? "" : " (disconnected)"}`);

    if (!this.match) {
      const actor = this.state.actors[slot];
      if (actor) actor.sessionId = "";
      return;
    }
    await this.endSeriesEarly();
  }

  async onDispose() {
    await this.endSeriesEarly();
    console.log(`[ArenaRoom] ${this.roomId} disposed`);
  }

  private humanSlots(): Slot[] {
    return this.roomOptions.mode === "ai" ? [0] : [0, 1];
  }

  private startRound() {
    if (this.finished) return;
    this.intermission = null;
    const { round } = this.series.standing();
    const seed = this.roomOptions.seed === undefined ? randomSeed() : (this.roomOptions.seed + round - 1) >>> 0;
    const controllers: [ActorController, ActorController] =
      this.roomOptions.mode === "ai"
        ? [this.humans[0], createController(1, { kind: "ai", tier: this.roomOptions.aiTier }, this.arenaConfig)]
        : [this.humans[0], this.humans[1]];

    this.match = new Match({ config: this.arenaConfig, seed, controllers });
    this.roundClosed = false;

    const aiActor = this.state.actors[1];
    if (this.roomOptions.mode === "ai" && aiActor) aiActor.controller = `ai:${this.roomOptions.aiTier}`;
    this.state.started = true;
    this.state.applySnapshot(this.match.snapshot());
    this.refreshMetadata();

    const started: RoundStartedDto = { round, seed };
    this.broadcast("roundStarted", started);
    this.setSimulationInterval((deltaTime) => {
      this.update(deltaTime);
    }, tickMs(this.arenaConfig));

    console.log(`[ArenaRoom] ${this.roomId} round ${round} started (seed ${seed})`);
  }

  private handleInput(client: Client, raw: unknown) {
    const slot = this.slotBySession.get(client.sessionId);
    if (slot === undefined) return;

    const message = parseInputMessage(raw);
    if (!message) {
      console.warn(`[ArenaRoom] Ignoring malformed input from ${client.sessionId}`);
      return;
    }
    const { up, down, left, right, dash } = message;
    this.humans[slot].setKeys({ up, down, left, right, dash });
  }

  /**
   * Game loop update. The match clock turns wall time into whole fixed ticks; events
   * of every tick run are broadcast in order, then the schema mirrors the final state.
   */
  private update(deltaTime: number) {
    const match = this.match;
    if (!match || this.roundClosed) return;

    const report = match.advance(deltaTime);
    for (const result of report.results) {
      this.reportTick(result);
    }
    this.state.applySnapshot(match.snapshot());

    if (report.fault) {
      console.error(`[ArenaRoom] ${this.roomId} tick ${report.fault.tick} failed: ${report.fault.reason}`);
      match.abort();
    }
    if (match.ended || match.aborted) {
      this.finishRound().catch((error: unknown) => {
        console.error(`[ArenaRoom] ${this.roomId} failed to close round:`, error);
      });
    }
  }

  private reportTick(result: EngineTickResult) {
    for (const event of result.events) {
      if (event.type === "aiFallback") {
        console.warn(`[ArenaRoom] AI fallback on slot ${event.slot} at tick ${result.tick}: ${event.message}`);
      } else if (event.type === "anomaly") {
        console.warn(`[ArenaRoom] Non-finite state reset for slot ${event.slot} at tick ${result.tick}`);
      }
    }
    if (result.events.length > 0) {
      const dto: TickEventsDto = { tick: result.tick, events: [...result.events] };
      this.broadcast("events", dto);
    }
  }

  /** Archive and report the current round, then queue the next one or end the series. */
  private async finishRound() {
    const match = this.match;
    if (!match || this.roundClosed) return;
    this.roundClosed = true;
    this.setSimulationInterval();

    const log = match.toReplay();
    let replayId: string | null = null;
    try {
      const summary = await archiveMatch(getReplayArchive(), log);
      replayId = summary?.id ?? null;
      if (summary) console.log(`[ArenaRoom] Archived replay ${summary.id} (${summary.tickCount} ticks)`);
    } catch (error) {
      console.error("[ArenaRoom] Failed to archive replay:", error);
    }

    const result = match.engine.result;
    if (!result) {
      const aborted: MatchAbortedDto = { tick: match.tick, replayId };
      this.broadcast("matchAborted", aborted);
      console.log(`[ArenaRoom] ${this.roomId} match aborted at tick ${match.tick}`);
      this.endSeries(false);
      return;
    }

    const { round } = this.series.standing();
    const standing = this.series.recordRound(result);
    this.state.applyStanding(standing);
    const ended: MatchEndedDto = { ...result, eliminations: [...result.eliminations], replayId, series: standing };
    this.broadcast("matchEnded", ended);
    console.log(`[ArenaRoom] ${this.roomId} round ${round} ended: ${result.reason}, winner ${result.winner ?? "none"}`);

    if (standing.decided) {
      this.endSeries(true);
    } else if (!this.finished) {
      this.intermission = this.clock.setTimeout(() => this.startRound(), config.roundIntermissionMs);
    }
    this.refreshMetadata();
  }

  /** A departure or disposal: abort a running round, or cancel the next one. */
  private async endSeriesEarly() {
    if (this.finished) return;
    if (this.match && !this.roundClosed) {
      this.match.abort();
      await this.finishRound();
      return;
    }
    if (this.intermission) {
      this.intermission.clear();
      this.intermission = null;
    }
    if (this.match) this.endSeries(false);
  }

  private endSeries(completed: boolean) {
    if (this.finished) return;
    this.finished = true;
    const standing = this.series.standing();
    const dto: SeriesEndedDto = { ...standing, completed };
    this.broadcast("seriesEnded", dto);
    console.log(
      `[ArenaRoom] ${this.roomId} series ${completed ? "ended" : "abandoned"} ${standing.wins[0]}-${standing.wins[1]}, winner ${standing.winner ?? "none"}`,
    );
    this.refreshMetadata();
  }

  private sendInit(client: Client, slot: Slot) {
    const { platform } = this.arenaConfig;
    const init: ArenaInitDto = {
      protocolVersion: PROTOCOL_VERSION,
      slot,
      mode: this.roomOptions.mode,
      tickRate: this.arenaConfig.tickRate,
      stocks: this.arenaConfig.stocks,
      platform: { startRadius: platform.startRadius, minRadius: platform.minRadius, shrinkStartMs: platform.shrinkStartMs },
      actorRadius: this.arenaConfig.actor.radius,
      countdownMs: this.arenaConfig.countdownMs,
      bestOf: this.series.bestOf,
    };
    client.send("arena:init", init);
  }

  private refreshMetadata() {
    void this.setMetadata({
      mode: this.roomOptions.mode,
      aiTier: this.roomOptions.aiTier,
      bestOf: this.series.bestOf,
      round: this.series.standing().round,
      started: this.match !== null,
      finished: this.finished,
    });
  }
}
