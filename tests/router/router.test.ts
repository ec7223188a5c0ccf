import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs";
import { NotFound, TargetUnavailable } from "../../src/core/errors.js";
import { createEngineBus, type EngineBus } from "../../src/core/events.js";
import { MessageRouter, ORCHESTRATOR } from "../../src/router/router.js";
import { SessionRegistry } from "../../src/sessions/registry.js";
import { FilesystemStore } from "../../src/store/storage.js";
import { tempDir } from "../helpers.js";

vi.mock("../../src/core/logger.js", () => ({
  log: { info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

describe("MessageRouter", () => {
  let testDir: string;
  let store: FilesystemStore;
  let registry: SessionRegistry;
  let bus: EngineBus;
  let router: MessageRouter;

  beforeEach(() => {
    testDir = tempDir("router");
    store = new FilesystemStore(testDir);
    bus = createEngineBus();
    registry = new SessionRegistry(store, bus);
    router = new MessageRouter(registry, store, { deliveryTimeoutMs: 1000, bus });
  });

  afterEach(() => {
    router.close();
    vi.useRealTimers();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function readySession(role = "backend"): string {
    const id = registry.createSession("p1", role);
    registry.markReady(id);
    return id;
  }

  it("fails synchronously for unknown and terminated targets", () => {
    expect(() => router.send(ORCHESTRATOR, "ghost", "x", "directive")).toThrow(TargetUnavailable);

    const id = readySession();
    registry.terminateSession(id);
    const err = (() => {
      try {
        router.send(ORCHESTRATOR, id, "x", "directive");
      } catch (e) {
        return e;
      }
      return null;
    })();
    expect(err).toBeInstanceOf(TargetUnavailable);
    if (err instanceof TargetUnavailable) expect(err.reason).toBe("terminated");
    expect(router.pending(id)).toEqual({ inbound: 0, outbound: 0 });
  });

  it("enqueues exactly one message per send", () => {
    const id = readySession();
    const messageId = router.send(ORCHESTRATOR, id, { task: "plan" }, "directive");

    const received = router.receive(id);
    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ id: messageId, from: ORCHESTRATOR, to: id, kind: "directive", payload: { task: "plan" } });
    expect(router.receive(id)).toEqual([]);
  });

  it("copies payloads on send", () => {
    const id = readySession();
    const payload = { task: "plan" };
    router.send(ORCHESTRATOR, id, payload, "directive");
    payload.task = "changed";
    expect(router.receive(id)[0]?.payload).toEqual({ task: "plan" });
  });

  it("moves a session to busy on ack and back to idle on result", () => {
    const id = readySession();
    const port = router.portFor(id);
    const directiveId = router.send(ORCHESTRATOR, id, "go", "directive");

    port.reply({ ack: directiveId }, "ack", directiveId);
    expect(registry.getSession(id).status).toBe("busy");

    port.reply({ done: true }, "result", directiveId);
    expect(registry.getSession(id).status).toBe("idle");

    const polled = router.poll(id);
    expect(polled.map((m) => m.kind)).toEqual(["ack", "result"]);
    expect(polled.every((m) => m.deliveredAt !== null && m.replyTo === directiveId)).toBe(true);
    expect(router.poll(id)).toEqual([]);
  });

  it("marks a session unreachable and reports an error when no ack arrives", () => {
    vi.useFakeTimers();
    const undelivered = vi.fn();
    bus.on("router:undelivered", undelivered);
    const id = readySession();
    const directiveId = router.send(ORCHESTRATOR, id, "go", "directive");

    vi.advanceTimersByTime(999);
    expect(registry.getSession(id).status).toBe("idle");

    vi.advanceTimersByTime(1);
    expect(registry.getSession(id).status).toBe("unreachable");
    expect(router.pending(id).inbound).toBe(0);

    const [notice] = router.poll(id);
    expect(notice).toMatchObject({
      from: id,
      to: ORCHESTRATOR,
      kind: "error",
      replyTo: directiveId,
      payload: { error: "SessionUnresponsive", messageId: directiveId, timeoutMs: 1000 },
    });
    expect(undelivered).toHaveBeenCalledWith({ sessionId: id, messageId: directiveId, timeoutMs: 1000 });
  });

  it("does not expire a directive that was acknowledged in time", () => {
    vi.useFakeTimers();
    const id = readySession();
    const directiveId = router.send(ORCHESTRATOR, id, "go", "directive");
    router.portFor(id).reply({ ack: directiveId }, "ack", directiveId);
    vi.advanceTimersByTime(5000);
    expect(registry.getSession(id).status).toBe("busy");
  });

  it("recovers an unreachable session on a late ack", () => {
    vi.useFakeTimers();
    const id = readySession();
    const directiveId = router.send(ORCHESTRATOR, id, "go", "directive");
    vi.advanceTimersByTime(1000);
    expect(registry.getSession(id).status).toBe("unreachable");

    router.portFor(id).reply({ ack: directiveId }, "ack", directiveId);
    expect(registry.getSession(id).status).toBe("busy");
  });

  it("rejects replies from terminated sessions and polls of unknown ones", () => {
    const id = readySession();
    registry.terminateSession(id);
    expect(() => router.portFor(id).reply("late", "result")).toThrow(NotFound);
    expect(() => router.poll("ghost")).toThrow(NotFound);
    expect(router.receive(id)).toEqual([]);
  });

  it("records sent and delivered events", () => {
    const id = readySession();
    const directiveId = router.send(ORCHESTRATOR, id, "go", "directive");
    router.portFor(id).reply({ ack: directiveId }, "ack", directiveId);

    const events = store.loadMessageEvents("p1");
    expect(events.map((e) => e.type)).toEqual(["sent", "sent", "delivered"]);
    const delivered = events[2];
    expect(delivered?.type === "delivered" ? delivered.messageId : null).toBe(directiveId);
  });
});
