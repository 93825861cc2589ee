// worldcore/sim/DemoSimulation.ts
// Small deterministic arena so the server can run standalone: drifting
// hazards, collectible orbs, and one avatar per active session. Avatars
// score by touching orbs. Not a gameplay implementation.

import type { PlayerInput } from "../core/MessageRouter";
import type { EntityId, EntitySnapshot, WorldTick } from "../shared/Entity";
import type { SessionId } from "../shared/Session";
import { Rng } from "../utils/Rng";
import type { ScoreUpdate, Simulation } from "./Simulation";

export interface DemoSimulationOptions {
  seed: string | number;
  width: number;
  height: number;
  drifters: number;
  orbs: number;
}

export const DEFAULT_DEMO_OPTIONS: DemoSimulationOptions = {
  seed: "arena-demo",
  width: 1000,
  height: 1000,
  drifters: 24,
  orbs: 12,
};

const MAX_SPEED = 200; // units per second
const ORB_RADIUS = 20;
const ORB_VALUE = 10;

interface Body {
  id: EntityId;
  type: "drifter" | "orb" | "player";
  x: number;
  y: number;
  vx: number;
  vy: number;
  health: number;
  owner: string | null;
}

function clamp(v: number, lo: number, hi: number): number {
  return v < lo ? lo : v > hi ? hi : v;
}

export class DemoSimulation implements Simulation {
  private readonly rng: Rng;
  private readonly bodies = new Map<EntityId, Body>();
  private readonly avatars = new Map<SessionId, EntityId>();
  private readonly scores = new Map<SessionId, number>();
  private pendingScores: ScoreUpdate[] = [];
  private nextId: EntityId = 1;

  constructor(private readonly opts: DemoSimulationOptions = DEFAULT_DEMO_OPTIONS) {
    this.rng = new Rng(opts.seed);

    for (let i = 0; i < opts.drifters; i++) {
      const angle = this.rng.range(0, Math.PI * 2);
      const speed = this.rng.range(10, 60);
      this.spawn("drifter", null, Math.cos(angle) * speed, Math.sin(angle) * speed);
    }
    for (let i = 0; i < opts.orbs; i++) {
      this.spawn("orb", null, 0, 0);
    }
  }

  step(_tick: WorldTick, deltaMs: number): readonly EntitySnapshot[] {
    const dt = clamp(deltaMs, 0, 250) / 1000;
    const { width, height } = this.opts;

    for (const b of this.bodies.values()) {
      if (b.type === "orb") continue;

      b.x += b.vx * dt;
      b.y += b.vy * dt;

      // Bounce off the arena walls
      if (b.x < 0 || b.x > width) {
        b.vx = -b.vx;
        b.x = clamp(b.x, 0, width);
      }
      if (b.y < 0 || b.y > height) {
        b.vy = -b.vy;
        b.y = clamp(b.y, 0, height);
      }
    }

    this.collectOrbs();

    return Array.from(this.bodies.values(), (b) => this.snapshot(b));
  }

  handleInput(input: PlayerInput): void {
    const id = this.avatars.get(input.sessionId);
    const body = id !== undefined ? this.bodies.get(id) : undefined;
    if (!body) return;

    if (input.command === "move") {
      const vx = input.args["vx"];
      const vy = input.args["vy"];
      if (typeof vx === "number" && Number.isFinite(vx)) body.vx = clamp(vx, -MAX_SPEED, MAX_SPEED);
      if (typeof vy === "number" && Number.isFinite(vy)) body.vy = clamp(vy, -MAX_SPEED, MAX_SPEED);
    } else if (input.command === "stop") {
      body.vx = 0;
      body.vy = 0;
    }
  }

  drainScores(): readonly ScoreUpdate[] {
    const out = this.pendingScores;
    this.pendingScores = [];
    return out;
  }

  onSessionActive(sessionId: SessionId): void {
    if (this.avatars.has(sessionId)) return;
    const body = this.spawn("player", sessionId, 0, 0);
    this.avatars.set(sessionId, body.id);
    this.scores.set(sessionId, 0);
    this.pendingScores.push({ sessionId, score: 0 });
  }

  onSessionClosed(sessionId: SessionId): void {
    const id = this.avatars.get(sessionId);
    if (id !== undefined) this.bodies.delete(id);
    this.avatars.delete(sessionId);
    this.scores.delete(sessionId);
    this.pendingScores = this.pendingScores.filter((s) => s.sessionId !== sessionId);
  }

  avatarOf(sessionId: SessionId): EntityId | undefined {
    return this.avatars.get(sessionId);
  }

  get entityCount(): number {
    return this.bodies.size;
  }

  private collectOrbs(): void {
    for (const [sessionId, avatarId] of this.avatars) {
      const avatar = this.bodies.get(avatarId);
      if (!avatar) continue;

      for (const orb of this.bodies.values()) {
        if (orb.type !== "orb") continue;
        if (Math.hypot(orb.x - avatar.x, orb.y - avatar.y) > ORB_RADIUS) continue;

        const score = (this.scores.get(sessionId) ?? 0) + ORB_VALUE;
        this.scores.set(sessionId, score);
        this.pendingScores.push({ sessionId, score });

        orb.x = this.rng.range(0, this.opts.width);
        orb.y = this.rng.range(0, this.opts.height);
      }
    }
  }

  private spawn(type: Body["type"], owner: string | null, vx: number, vy: number): Body {
    const body: Body = {
      id: this.nextId++,
      type,
      x: this.rng.range(0, this.opts.width),
      y: this.rng.range(0, this.opts.height),
      vx,
      vy,
      health: type === "player" ? 100 : 1,
      owner,
    };
    this.bodies.set(body.id, body);
    return body;
  }

  private snapshot(b: Body): EntitySnapshot {
    return {
      id: b.id,
      type: b.type,
      x: b.x,
      y: b.y,
      vx: b.vx,
      vy: b.vy,
      direction: b.vx === 0 && b.vy === 0 ? 0 : Math.atan2(b.vy, b.vx),
      health: b.health,
      owner: b.owner,
    };
  }
}
