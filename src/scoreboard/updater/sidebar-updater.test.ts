import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import type { ScoreEntry, SidebarObjective } from "../score";
import type { Team, TeamStore } from "../team";
import { ScorePacketAction, ScorePacketCodec } from "../payload";
import { ObjectiveUpdateType, SidebarReconciler } from "../display";
import { SidebarUpdater } from "./sidebar-updater";

class MockTransport {
  sent: Uint8Array[] = [];

  send(data: Uint8Array): void {
    this.sent.push(data);
  }
}

const noTeams: TeamStore = {
  isFlaggedForRemoval: () => false,
  teamContains: () => false,
  teamFor: () => undefined,
};

describe("SidebarUpdater", () => {
  let scores: ScoreEntry[];
  let objective: SidebarObjective;
  let transport: MockTransport;
  let directives: { destroySidebar: Mock; showSidebar: Mock };
  let reconciler: SidebarReconciler;
  let updater: SidebarUpdater;

  beforeEach(() => {
    scores = [
      { name: "A", score: 10, hidden: false },
      { name: "B", score: 5, hidden: false },
    ];
    objective = { id: "kills", displayName: "Kills", listScores: () => scores };
    transport = new MockTransport();
    directives = { destroySidebar: vi.fn(), showSidebar: vi.fn() };
    reconciler = new SidebarReconciler({ teams: noTeams, directives });
    updater = new SidebarUpdater({ reconciler, objective, transport, config: { rate: 10 } });
  });

  describe("tick", () => {
    it("should send only a CHANGE packet on the first render", () => {
      updater.markObjective(ObjectiveUpdateType.ADD);

      expect(updater.tick()).toBe(1);
      expect(directives.showSidebar).toHaveBeenCalledWith("kills", "Kills", "sidebar");
      expect(ScorePacketCodec.decode(transport.sent[0])).toEqual({
        action: ScorePacketAction.CHANGE,
        entries: [
          { scoreboardId: 1, objectiveId: "kills", score: 10, displayName: "A" },
          { scoreboardId: 2, objectiveId: "kills", score: 5, displayName: "B" },
        ],
      });
    });

    it("should send nothing when nothing changed", () => {
      updater.tick();
      transport.sent = [];

      expect(updater.tick()).toBe(0);
      expect(transport.sent).toEqual([]);
    });

    it("should send REMOVE before CHANGE", () => {
      updater.tick();
      transport.sent = [];

      scores = [
        { name: "A", score: 10, hidden: false },
        { name: "C", score: 10, hidden: false },
      ];
      expect(updater.tick()).toBe(2);

      const [first, second] = transport.sent.map((buf) => ScorePacketCodec.decode(buf));
      expect(first.action).toBe(ScorePacketAction.REMOVE);
      // B left, A gained a tie marker
      expect(first.entries.map((e) => e.displayName)).toEqual(["B", "§0§rA"]);
      expect(second.action).toBe(ScorePacketAction.CHANGE);
      expect(second.entries.map((e) => e.displayName)).toEqual(["§0§rA", "§1§rC"]);
    });

    it("should consume a transition once", () => {
      updater.markObjective(ObjectiveUpdateType.ADD);
      updater.tick();
      updater.tick();

      expect(directives.showSidebar).toHaveBeenCalledTimes(1);
    });

    it("should keep a pending ADD over a later UPDATE", () => {
      updater.markObjective(ObjectiveUpdateType.ADD);
      updater.markObjective(ObjectiveUpdateType.UPDATE);
      updater.tick();

      expect(directives.destroySidebar).not.toHaveBeenCalled();
      expect(directives.showSidebar).toHaveBeenCalledTimes(1);
    });

    it("should forward team updates to the reconciler", () => {
      const team: Team = { name: "red", prefix: "[R] ", suffix: "" };
      const setTeamFor = vi.spyOn(reconciler, "setTeamFor");
      const names = new Set(["A"]);

      updater.setTeamFor(team, names);

      expect(setTeamFor).toHaveBeenCalledWith(team, names);
    });

    it("should cut a long team-decorated name and stay in sync", () => {
      const staff: Team = { name: "staff", prefix: "§c§l[Moderator+] §r§7", suffix: " §8[§aonline in lobby§8]" };
      const teams: TeamStore = {
        isFlaggedForRemoval: () => false,
        teamContains: (team, name) => team === staff && name === "SomePlayerName16",
        teamFor: (name) => (name === "SomePlayerName16" ? staff : undefined),
      };
      scores = [{ name: "SomePlayerName16", score: 3, hidden: false }];
      reconciler = new SidebarReconciler({ teams, directives });
      updater = new SidebarUpdater({ reconciler, objective, transport });

      expect(updater.tick()).toBe(1);
      // 68 bytes rendered, the last whole character before byte 64 ends the name
      expect(ScorePacketCodec.decode(transport.sent[0]).entries[0].displayName).toBe(
        "§c§l[Moderator+] §r§7SomePlayerName16 §8[§aonline in lobby"
      );
      expect(updater.tick()).toBe(0);
    });

    it("should report a failed asynchronous send", async () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      const failing = { send: () => Promise.reject(new Error("closed")) };
      updater = new SidebarUpdater({ reconciler, objective, transport: failing });

      updater.tick();
      await Promise.resolve();

      expect(error).toHaveBeenCalledWith("[SidebarUpdater] Failed to send CHANGE packet: Error: closed");
      error.mockRestore();
    });
  });

  describe("start/stop", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      updater.stop();
      vi.useRealTimers();
    });

    it("should render at the configured rate", () => {
      const render = vi.spyOn(reconciler, "render");

      updater.start();
      expect(updater.isRunning).toBe(true);

      vi.advanceTimersByTime(300);
      expect(render).toHaveBeenCalledTimes(3);
    });

    it("should stop rendering once stopped", () => {
      const render = vi.spyOn(reconciler, "render");

      updater.start();
      vi.advanceTimersByTime(100);
      updater.stop();
      vi.advanceTimersByTime(500);

      expect(updater.isRunning).toBe(false);
      expect(render).toHaveBeenCalledTimes(1);
    });

    it("should keep running after a render throws", () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      const render = vi.spyOn(reconciler, "render").mockImplementationOnce(() => {
        throw new Error("boom");
      });

      updater.start();
      vi.advanceTimersByTime(300);

      expect(error).toHaveBeenCalledWith("[SidebarUpdater] Render failed: Error: boom");
      expect(render).toHaveBeenCalledTimes(3);
      expect(updater.isRunning).toBe(true);
      error.mockRestore();
    });

    it("should ignore a second start", () => {
      const render = vi.spyOn(reconciler, "render");

      updater.start();
      updater.start();
      vi.advanceTimersByTime(100);

      expect(render).toHaveBeenCalledTimes(1);
    });
  });

  it("should reject a non-positive rate", () => {
    expect(
      () => new SidebarUpdater({ reconciler, objective, transport, config: { rate: 0 } })
    ).toThrow("rate must be positive, got 0");
  });
});
