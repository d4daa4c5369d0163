import assert from "node:assert/strict";
import { test } from "node:test";

import { isGuiderError, RpcFailureError } from "../../errors.ts";
import type { Subscription } from "../../remote/broadcaster.ts";
import { ConnectionState, GuiderClient, type GuiderClientOptions } from "../../remote/client.ts";
import { type GuiderEvent, GuiderEventType } from "../../remote/protocol.ts";
import { MockGuider } from "../utils/mock_guider.ts";
import { drain, HeldWriteFactory, nextEvent, quietConsole, waitFor } from "../utils/test_helpers.ts";

const LIFECYCLE: ReadonlySet<string> = new Set([
  GuiderEventType.CONNECTION_LOST,
  GuiderEventType.RECONNECTING,
  GuiderEventType.RECONNECTED,
  GuiderEventType.RECONNECT_FAILED,
]);

function createClient(guider: MockGuider, options: GuiderClientOptions = {}): GuiderClient {
  return new GuiderClient({
    connectionFactory: guider,
    commandTimeoutMs: 2000,
    reconnect: { enabled: false },
    ...options,
  });
}

/** Lifecycle events up to and including the first of type `last`. */
async function lifecycleUntil(subscription: Subscription, last: GuiderEventType, timeout = 2000): Promise<GuiderEvent[]> {
  const events: GuiderEvent[] = [];
  for (;;) {
    const event = await nextEvent(subscription, (candidate) => LIFECYCLE.has(candidate.Event), timeout);
    events.push(event);
    if (event.Event === last) {
      return events;
    }
  }
}

test("GuiderClient", async (t) => {
  await t.test("calls before connecting fail with NotConnected", async (t) => {
    quietConsole(t);
    const client = createClient(new MockGuider());
    assert.equal(client.getState(), ConnectionState.DISCONNECTED);
    await assert.rejects(client.call("get_app_state"), (error) => isGuiderError(error, "NOT_CONNECTED"));
  });

  await t.test("connects, caches the version and answers a call", async (t) => {
    quietConsole(t);
    const guider = new MockGuider().reply("get_app_state", "Guiding");
    const client = createClient(guider);
    try {
      await client.connect();
      assert.equal(client.getState(), ConnectionState.CONNECTED);
      assert.equal(client.isConnected(), true);

      assert.equal(await client.call("get_app_state"), "Guiding");
      assert.deepEqual(guider.received, [{ connection: 0, id: 1, method: "get_app_state", params: undefined }]);

      await waitFor(() => client.getVersion() === "2.6.13", 1000, "version greeting");
    } finally {
      await client.disconnect();
    }
  });

  await t.test("connecting twice keeps the session", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    const client = createClient(guider);
    try {
      await client.connect();
      await client.connect();
      assert.equal(guider.connectAttempts, 1);
      assert.equal(client.isConnected(), true);
    } finally {
      await client.disconnect();
    }
  });

  await t.test("a refused connection fails with ConnectionFailed", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    guider.refuseConnections = true;
    const client = createClient(guider);
    await assert.rejects(client.connect(), (error) => {
      assert.ok(isGuiderError(error, "CONNECTION_FAILED"));
      assert.equal(error.message, "Connection failed: Connection refused");
      return true;
    });
    assert.equal(client.getState(), ConnectionState.DISCONNECTED);
  });

  await t.test("remote errors surface as RpcFailureError", async (t) => {
    quietConsole(t);
    const guider = new MockGuider().handle("guide", () => ({ error: { code: 1, message: "not calibrated" } }));
    const client = createClient(guider);
    try {
      await client.connect();
      await assert.rejects(client.call("guide", { recalibrate: false }), (error) => {
        assert.ok(error instanceof RpcFailureError);
        assert.equal(error.message, "RPC error: 1 - not calibrated");
        return true;
      });
      await assert.rejects(client.call("no_such_method"), (error) => {
        assert.ok(error instanceof RpcFailureError);
        assert.equal(error.rpcCode, -32601);
        return true;
      });
      assert.equal(client.isConnected(), true);
    } finally {
      await client.disconnect();
    }
  });

  await t.test("a timed out call leaves the session usable and its late response is logged", async (t) => {
    const logs = quietConsole(t);
    const guider = new MockGuider()
      .handle("capture_single_frame", () => "no-reply")
      .reply("get_app_state", "Looping");
    const client = createClient(guider);
    try {
      await client.connect();
      await assert.rejects(client.call("capture_single_frame", undefined, 100), (error) => {
        assert.ok(isGuiderError(error, "TIMEOUT"));
        assert.equal(error.message, "Request 'capture_single_frame' timed out after 100ms");
        return true;
      });

      guider.send({ jsonrpc: "2.0", result: 0, id: 1 });
      const expected = "[GuiderClient.dispatch] Protocol anomaly: Response for unknown id 1 discarded";
      await waitFor(
        () => logs.warn.mock.calls.some((call) => call.arguments[0] === expected),
        1000,
        "anomaly warning",
      );

      assert.equal(client.isConnected(), true);
      assert.equal(await client.call("get_app_state"), "Looping");
    } finally {
      await client.disconnect();
    }
  });

  await t.test("concurrent calls get distinct identifiers", async (t) => {
    quietConsole(t);
    const guider = new MockGuider().handle("echo_id", (_params, id) => ({ result: id }));
    const client = createClient(guider);
    try {
      await client.connect();
      const results = await Promise.all(Array.from({ length: 50 }, () => client.call("echo_id")));
      assert.equal(new Set(results).size, 50);
      assert.deepEqual(
        guider.received.map((call) => call.id).sort((a, b) => a - b),
        Array.from({ length: 50 }, (_, i) => i + 1),
      );
    } finally {
      await client.disconnect();
    }
  });

  await t.test("events reach every subscriber that existed when they arrived", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    const client = createClient(guider);
    try {
      await client.connect();
      const first = client.subscribe();
      const second = client.subscribe();

      guider.send({ Event: "StarLost", Frame: 42, SNR: 2.5 });
      const isStarLost = (event: GuiderEvent) => event.Event === GuiderEventType.STAR_LOST;
      const expected = { Event: GuiderEventType.STAR_LOST, Frame: 42, SNR: 2.5 };
      assert.deepEqual(await nextEvent(first, isStarLost), expected);
      assert.deepEqual(await nextEvent(second, isStarLost), expected);

      const third = client.subscribe();
      guider.send({ Event: "Paused" });
      assert.deepEqual(await nextEvent(third), { Event: GuiderEventType.PAUSED });
    } finally {
      await client.disconnect();
    }
  });

  await t.test("unknown events are delivered as Unrecognized", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    guider.greeting = undefined;
    const client = createClient(guider);
    try {
      const events = client.subscribe();
      await client.connect();
      guider.send({ Event: "BrandNewEvent", Detail: "x" });
      assert.deepEqual(await nextEvent(events), {
        Event: GuiderEventType.UNRECOGNIZED,
        name: "BrandNewEvent",
        payload: { Detail: "x" },
      });
    } finally {
      await client.disconnect();
    }
  });

  await t.test("a subscriber that never reads does not hold up others", async (t) => {
    quietConsole(t);
    const guider = new MockGuider().reply("get_app_state", "Guiding");
    const client = createClient(guider);
    try {
      const idle = client.subscribe({ capacity: 2 });
      const reader = client.subscribe();
      await client.connect();

      for (let frame = 1; frame <= 10; frame++) {
        guider.send({ Event: "GuideStep", Frame: frame });
      }
      const frames: number[] = [];
      while (frames.length < 10) {
        const event = await nextEvent(reader, (candidate) => candidate.Event === GuiderEventType.GUIDE_STEP);
        if (event.Event === GuiderEventType.GUIDE_STEP && event.Frame !== undefined) {
          frames.push(event.Frame);
        }
      }
      assert.deepEqual(frames, [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      assert.equal(await client.call("get_app_state"), "Guiding");

      // Version greeting plus ten steps, two kept.
      assert.equal(idle.dropped, 9);
      assert.deepEqual(drain(idle), [
        { Event: GuiderEventType.GUIDE_STEP, Frame: 9 },
        { Event: GuiderEventType.GUIDE_STEP, Frame: 10 },
      ]);
    } finally {
      await client.disconnect();
    }
  });

  await t.test("the application state cache follows AppState events", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    const client = createClient(guider);
    await client.connect();
    assert.equal(client.getCachedAppState(), undefined);
    guider.send({ Event: "AppState", State: "Looping" });
    await waitFor(() => client.getCachedAppState() === "Looping", 1000, "cached state");
    await waitFor(() => client.getVersion() !== undefined, 1000, "version");

    await client.disconnect();
    assert.equal(client.getCachedAppState(), undefined);
    assert.equal(client.getVersion(), undefined);
  });

  await t.test("disconnect fails pending calls and is idempotent", async (t) => {
    quietConsole(t);
    const guider = new MockGuider().handle("loop", () => "no-reply");
    const client = createClient(guider);
    const events = client.subscribe();
    await client.connect();

    const pending = client.call("loop");
    await guider.waitForCall("loop");
    await client.disconnect();

    await assert.rejects(pending, (error) => {
      assert.ok(isGuiderError(error, "CONNECTION_LOST"));
      assert.equal(error.message, "Connection lost: Client disconnected");
      return true;
    });
    assert.equal(client.getState(), ConnectionState.DISCONNECTED);
    assert.deepEqual(await lifecycleUntil(events, GuiderEventType.CONNECTION_LOST), [
      { Event: GuiderEventType.CONNECTION_LOST, reason: "Client disconnected" },
    ]);

    await client.disconnect();
    assert.equal(client.getState(), ConnectionState.DISCONNECTED);
    assert.deepEqual(drain(events).filter((event) => LIFECYCLE.has(event.Event)), []);
  });

  await t.test("a remote close fails pending calls and ends the session", async (t) => {
    quietConsole(t);
    const guider = new MockGuider().handle("loop", () => "no-reply");
    const client = createClient(guider);
    const events = client.subscribe();
    await client.connect();

    const pending = client.call("loop");
    await guider.waitForCall("loop");
    guider.dropConnections();

    await assert.rejects(pending, (error) => {
      assert.ok(isGuiderError(error, "CONNECTION_LOST"));
      assert.equal(error.message, "Connection lost: Connection closed by remote");
      return true;
    });
    assert.deepEqual(await lifecycleUntil(events, GuiderEventType.CONNECTION_LOST), [
      { Event: GuiderEventType.CONNECTION_LOST, reason: "Connection closed by remote" },
    ]);
    await waitFor(() => client.getState() === ConnectionState.DISCONNECTED, 1000, "disconnected");
    await assert.rejects(client.call("loop"), (error) => isGuiderError(error, "NOT_CONNECTED"));
  });

  await t.test("an I/O failure is reported as a lost connection", async (t) => {
    quietConsole(t);
    const guider = new MockGuider().handle("loop", () => "no-reply");
    const client = createClient(guider);
    const events = client.subscribe();
    await client.connect();

    const pending = client.call("loop");
    await guider.waitForCall("loop");
    guider.failConnections();

    await assert.rejects(pending, (error) => isGuiderError(error, "CONNECTION_LOST"));
    const [lost] = await lifecycleUntil(events, GuiderEventType.CONNECTION_LOST);
    assert.equal(lost.Event, GuiderEventType.CONNECTION_LOST);
    await waitFor(() => client.getState() === ConnectionState.DISCONNECTED, 1000, "disconnected");
  });

  await t.test("reconnects after a remote close", async (t) => {
    quietConsole(t);
    const guider = new MockGuider().reply("get_app_state", "Stopped");
    const client = createClient(guider, { reconnect: { enabled: true, intervalMs: 20 } });
    const events = client.subscribe();
    try {
      await client.connect();
      guider.dropConnections();

      assert.deepEqual(await lifecycleUntil(events, GuiderEventType.RECONNECTED), [
        { Event: GuiderEventType.CONNECTION_LOST, reason: "Connection closed by remote" },
        { Event: GuiderEventType.RECONNECTING, attempt: 1 },
        { Event: GuiderEventType.RECONNECTED },
      ]);
      assert.equal(client.getState(), ConnectionState.CONNECTED);
      assert.equal(guider.connectAttempts, 2);

      assert.equal(await client.call("get_app_state"), "Stopped");
      assert.deepEqual(guider.received, [{ connection: 1, id: 1, method: "get_app_state", params: undefined }]);
    } finally {
      await client.disconnect();
    }
  });

  await t.test("gives up after the configured number of retries", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    const client = createClient(guider, { reconnect: { enabled: true, intervalMs: 10, maxRetries: 3 } });
    const events = client.subscribe();
    await client.connect();

    guider.refuseConnections = true;
    guider.dropConnections();

    assert.deepEqual(await lifecycleUntil(events, GuiderEventType.RECONNECT_FAILED), [
      { Event: GuiderEventType.CONNECTION_LOST, reason: "Connection closed by remote" },
      { Event: GuiderEventType.RECONNECTING, attempt: 1, maxAttempts: 3 },
      { Event: GuiderEventType.RECONNECTING, attempt: 2, maxAttempts: 3 },
      { Event: GuiderEventType.RECONNECTING, attempt: 3, maxAttempts: 3 },
      { Event: GuiderEventType.RECONNECT_FAILED, reason: "Max retries (3) exceeded" },
    ]);
    assert.equal(guider.connectAttempts, 4);
    assert.equal(client.getState(), ConnectionState.DISCONNECTED);
    assert.equal(client.isReconnecting(), false);
  });

  await t.test("zero retries gives up without an attempt", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    const client = createClient(guider, { reconnect: { enabled: true, intervalMs: 10_000, maxRetries: 0 } });
    const events = client.subscribe();
    await client.connect();
    guider.dropConnections();

    assert.deepEqual(await lifecycleUntil(events, GuiderEventType.RECONNECT_FAILED), [
      { Event: GuiderEventType.CONNECTION_LOST, reason: "Connection closed by remote" },
      { Event: GuiderEventType.RECONNECT_FAILED, reason: "Max retries (0) exceeded" },
    ]);
    assert.equal(guider.connectAttempts, 1);
  });

  await t.test("calls while reconnecting fail with ConnectionLost", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    const client = createClient(guider, { reconnect: { enabled: true, intervalMs: 10_000 } });
    const events = client.subscribe();
    try {
      await client.connect();
      guider.dropConnections();
      await waitFor(() => client.isReconnecting(), 1000, "reconnecting");

      await assert.rejects(client.call("get_app_state"), (error) => {
        assert.ok(isGuiderError(error, "CONNECTION_LOST"));
        assert.equal(error.message, "Connection lost: Reconnection in progress");
        return true;
      });

      await client.stopReconnection();
      assert.equal(client.getState(), ConnectionState.DISCONNECTED);
      assert.equal(client.isAutoReconnectEnabled(), true);
      const lifecycle = await lifecycleUntil(events, GuiderEventType.RECONNECT_FAILED);
      assert.deepEqual(lifecycle.at(-1), { Event: GuiderEventType.RECONNECT_FAILED, reason: "Reconnection cancelled" });
      assert.equal(guider.connectAttempts, 1);
    } finally {
      await client.disconnect();
    }
  });

  await t.test("disabling auto-reconnect stops a running loop", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    const client = createClient(guider, { reconnect: { enabled: true, intervalMs: 10_000 } });
    const events = client.subscribe();
    await client.connect();
    guider.dropConnections();
    await waitFor(() => client.isReconnecting(), 1000, "reconnecting");

    await client.setAutoReconnectEnabled(false);
    assert.equal(client.isAutoReconnectEnabled(), false);
    assert.equal(client.getState(), ConnectionState.DISCONNECTED);
    const lifecycle = await lifecycleUntil(events, GuiderEventType.RECONNECT_FAILED);
    assert.deepEqual(lifecycle.at(-1), { Event: GuiderEventType.RECONNECT_FAILED, reason: "Auto-reconnect disabled" });
  });

  await t.test("connect cancels a running reconnect loop", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    const client = createClient(guider, { reconnect: { enabled: true, intervalMs: 10_000 } });
    const events = client.subscribe();
    try {
      await client.connect();
      guider.dropConnections();
      await waitFor(() => client.isReconnecting(), 1000, "reconnecting");

      await client.connect();
      assert.equal(client.getState(), ConnectionState.CONNECTED);
      const lifecycle = await lifecycleUntil(events, GuiderEventType.RECONNECT_FAILED);
      assert.deepEqual(lifecycle, [
        { Event: GuiderEventType.CONNECTION_LOST, reason: "Connection closed by remote" },
        { Event: GuiderEventType.RECONNECT_FAILED, reason: "Reconnection cancelled" },
      ]);
      assert.equal(guider.connectAttempts, 2);
    } finally {
      await client.disconnect();
    }
  });

  await t.test("a manual disconnect never triggers reconnection", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    const client = createClient(guider, { reconnect: { enabled: true, intervalMs: 10 } });
    await client.connect();
    await client.disconnect();
    await new Promise((resolve) => setTimeout(resolve, 50));
    assert.equal(client.getState(), ConnectionState.DISCONNECTED);
    assert.equal(guider.connectAttempts, 1);
  });

  await t.test("disconnect interrupts a reconnect wait", async (t) => {
    quietConsole(t);
    const guider = new MockGuider();
    const client = createClient(guider, { reconnect: { enabled: true, intervalMs: 10_000 } });
    const events = client.subscribe();
    await client.connect();
    guider.dropConnections();
    await waitFor(() => client.isReconnecting(), 1000, "reconnecting");

    const started = Date.now();
    await client.disconnect();
    assert.ok(Date.now() - started < 1000);
    assert.equal(client.getState(), ConnectionState.DISCONNECTED);
    assert.deepEqual(await lifecycleUntil(events, GuiderEventType.RECONNECT_FAILED), [
      { Event: GuiderEventType.CONNECTION_LOST, reason: "Connection closed by remote" },
      { Event: GuiderEventType.RECONNECT_FAILED, reason: "Reconnection cancelled" },
    ]);

    await client.disconnect();
    assert.deepEqual(drain(events).filter((event) => LIFECYCLE.has(event.Event)), []);
    assert.equal(guider.connectAttempts, 1);
  });

  await t.test("a call made after loss is detected fails with ConnectionLost", async (t) => {
    quietConsole(t);
    const factory = new HeldWriteFactory();
    const client = new GuiderClient({ connectionFactory: factory, reconnect: { enabled: false } });
    try {
      await client.connect();
      const [transport] = factory.transports;
      assert.ok(transport);

      const first = client.call("loop");
      await waitFor(() => transport.writes.length === 1, 1000, "first write");
      const [write] = transport.writes;
      assert.ok(write);

      // Issued from the first call's rejection, before the state change is applied.
      const followUp = first.catch(() => client.call("get_app_state"));
      write.reject(new Error("EPIPE"));

      await assert.rejects(followUp, (error) => {
        assert.ok(isGuiderError(error, "CONNECTION_LOST"));
        assert.equal(error.message, "Connection lost: Connection closing");
        return true;
      });
      await waitFor(() => client.getState() === ConnectionState.DISCONNECTED, 1000, "disconnected");
      assert.equal(transport.closed, true);
    } finally {
      await client.disconnect();
    }
  });
});
