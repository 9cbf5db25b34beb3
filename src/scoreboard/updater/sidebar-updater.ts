import type { SidebarObjective } from "../score";
import type { Team } from "../team";
import { ScorePacketAction, ScorePacketCodec } from "../payload";
import { ObjectiveUpdateType, type SidebarReconciler } from "../display";

/**
 * Where encoded score packets go, usually the client's connection
 */
export interface ScorePacketTransport {
  send(data: Uint8Array): void | Promise<void>;
}

/**
 * Configuration for SidebarUpdater
 */
export interface SidebarUpdaterConfig {
  /**
   * Renders per second while started (default: 20)
   */
  rate?: number;

  /**
   * Enable debug logging
   */
  debug?: boolean;
}

export interface SidebarUpdaterProps<TTeam extends Team = Team> {
  reconciler: SidebarReconciler<TTeam>;
  objective: SidebarObjective;
  transport: ScorePacketTransport;
  config?: SidebarUpdaterConfig;
}

/**
 * Drives the sidebar of one client session.
 *
 * Every tick renders the objective once and ships the result as a REMOVE
 * packet followed by a CHANGE packet, skipping empty ones. Objective
 * transitions are queued with {@link markObjective} and picked up by the
 * next tick.
 *
 * @example
 * ```ts
 * const updater = new SidebarUpdater({
 *   reconciler: new SidebarReconciler({ teams, directives }),
 *   objective,
 *   transport: connection,
 * });
 *
 * updater.markObjective(ObjectiveUpdateType.ADD);
 * updater.start();
 * ```
 */
export class SidebarUpdater<TTeam extends Team = Team> {
  private reconciler: SidebarReconciler<TTeam>;
  private objective: SidebarObjective;
  private transport: ScorePacketTransport;
  private config: Required<SidebarUpdaterConfig>;

  private pendingUpdate = ObjectiveUpdateType.NOTHING;

  private intervalMs: number;
  private maxTicksPerLoop: number;
  private accumulator = 0;
  private last = 0;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor({ reconciler, objective, transport, config }: SidebarUpdaterProps<TTeam>) {
    this.reconciler = reconciler;
    this.objective = objective;
    this.transport = transport;
    this.config = {
      rate: config?.rate ?? 20,
      debug: config?.debug ?? false,
    };

    if (!(this.config.rate > 0)) {
      throw new RangeError(`rate must be positive, got ${this.config.rate}`);
    }

    this.intervalMs = 1000 / this.config.rate;
    // Catch up at most rate/2 ticks per loop, but at least 1.
    this.maxTicksPerLoop = Math.max(1, Math.floor(this.config.rate / 2));
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Queues an objective transition for the next tick.
   * A pending ADD already implies a full redraw and is kept.
   */
  markObjective(type: ObjectiveUpdateType): void {
    if (type === ObjectiveUpdateType.NOTHING) return;
    if (this.pendingUpdate === ObjectiveUpdateType.ADD) return;
    this.pendingUpdate = type;
  }

  /**
   * See {@link SidebarReconciler.setTeamFor}
   */
  setTeamFor(team: TTeam, names: ReadonlySet<string>): void {
    this.reconciler.setTeamFor(team, names);
  }

  /**
   * Renders once and sends the resulting packets.
   *
   * @returns Number of packets sent
   */
  tick(): number {
    const updateType = this.pendingUpdate;
    this.pendingUpdate = ObjectiveUpdateType.NOTHING;

    const { add, remove } = this.reconciler.render(this.objective, updateType);

    // Both packets are encoded before either goes out, so a bad batch sends nothing.
    const packets: Array<[ScorePacketAction, Uint8Array]> = [];
    if (remove.length > 0) {
      packets.push([ScorePacketAction.REMOVE, ScorePacketCodec.encode(ScorePacketAction.REMOVE, remove)]);
    }
    if (add.length > 0) {
      packets.push([ScorePacketAction.CHANGE, ScorePacketCodec.encode(ScorePacketAction.CHANGE, add)]);
    }

    for (const [action, data] of packets) {
      this.send(action, data);
    }

    return packets.length;
  }

  /**
   * Starts ticking at the configured rate.
   */
  start(): void {
    if (this.running) return;

    this.running = true;
    this.accumulator = 0;
    this.last = Date.now();
    this.timer = setTimeout(this.loop, this.intervalMs);
    this.log(`Started at ${this.config.rate} renders/s`);
  }

  /**
   * Stops ticking. Pending transitions stay queued.
   */
  stop(): void {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.log("Stopped");
  }

  private loop = (): void => {
    if (!this.running) return;

    const now = Date.now();
    this.accumulator += now - this.last;
    this.last = now;

    let ticks = 0;
    while (this.accumulator >= this.intervalMs && ticks < this.maxTicksPerLoop) {
      this.accumulator -= this.intervalMs;
      ticks++;
      try {
        this.tick();
      } catch (error) {
        // Keep the loop alive, the next render starts from the reconciler's state
        console.error(`[SidebarUpdater] Render failed: ${error}`);
      }
    }

    const skipped = Math.floor(this.accumulator / this.intervalMs);
    if (skipped > 0) {
      this.log(`Skipped ${skipped} renders`);
      this.accumulator -= skipped * this.intervalMs;
    }

    this.timer = setTimeout(this.loop, this.intervalMs);
  };

  private send(action: ScorePacketAction, data: Uint8Array): void {
    this.log(`Sending ${ScorePacketAction[action]} (${data.byteLength} bytes)`);

    const result = this.transport.send(data);
    if (result instanceof Promise) {
      result.catch((error: unknown) => {
        console.error(`[SidebarUpdater] Failed to send ${ScorePacketAction[action]} packet: ${error}`);
      });
    }
  }

  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[SidebarUpdater] ${message}`);
    }
  }
}
