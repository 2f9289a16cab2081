/**
 * Usage examples: production-shaped code written against the capability
 * interfaces, exercised with the mocks.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { task, MockSpawner, createEventLoopSpawner, type Spawner } from "./executor-entry";
import {
  MockTicker,
  MockTimer,
  SystemTimer,
  type Ticker,
  type TickerFactory,
  type TimerFactory,
} from "./time-entry";
import { Duration } from "./duration";
import { ok, unwrap } from "./result";
import { withVerification } from "./verify";

// =============================================================================
// Production code
// =============================================================================

const counterTask = (Timer: TimerFactory) =>
  task(
    async () => {
      let val = 0;
      for (;;) {
        val += 1;
        await Timer.after(Duration.seconds(1));
      }
    },
    { name: "counter" }
  );

const delayedTask = (Timer: TimerFactory) =>
  task(
    async (waitFor: Duration) => {
      await Timer.after(waitFor);
    },
    { name: "delayed" }
  );

function spawnTasks(spawner: Spawner, Timer: TimerFactory) {
  unwrap(spawner.spawn(counterTask(Timer)()));
  unwrap(spawner.spawn(delayedTask(Timer)(Duration.seconds(5))));
}

async function useATimer(Timer: TimerFactory) {
  await Timer.after(Duration.seconds(1));
  // Do something.
  await Timer.after(Duration.millis(500));
  // Do something else.
}

async function useATicker(ticker: Ticker) {
  await ticker.next();
  // Do something.
  await ticker.next();
  // Do something else.
}

async function addingWithTimer(state: { val: number }, delay: Duration, Timer: TimerFactory) {
  state.val += 1;
  await Timer.after(delay);
}

async function addingWithTicker(state: { val: number }, ticker: Ticker) {
  state.val += 1;
  await ticker.next();
}

/** Builds its own ticker, so a test cannot give it an expectation. */
async function tickerLoop(Ticker: TickerFactory, rounds: number) {
  const ticker = Ticker.every(Duration.seconds(1));
  const state = { val: 0 };
  for (let i = 0; i < rounds; i++) {
    await addingWithTicker(state, ticker);
  }
  return state.val;
}

// =============================================================================
// Tests
// =============================================================================

describe("executor example", () => {
  it("spawns all tasks", () => {
    const spawner = MockSpawner.expect(2);
    spawnTasks(spawner, MockTimer);

    expect(spawner.check()).toEqual(ok(undefined));
  });

  it("runs the same code on the event-loop spawner", async () => {
    const spawner = createEventLoopSpawner();
    const delayed = delayedTask(SystemTimer);

    unwrap(spawner.spawn(delayed(Duration.zero)));
    await spawner.idle();

    expect(delayed.running()).toBe(0);
  });
});

describe.sequential("timer example", () => {
  beforeEach(() => {
    MockTimer.clearChannel();
  });

  it("uses the mocked timer type", async () => {
    await useATimer(MockTimer);

    const rx = MockTimer.getReceiver();
    expect(rx.tryRecv()).toEqual(ok(Duration.seconds(1)));
    expect(rx.tryRecv()).toEqual(ok(Duration.millis(500)));
  });
});

describe("ticker example", () => {
  it("uses the mocked ticker type", async () => {
    const ticker = MockTicker.expect(2);
    await useATicker(ticker);

    expect(ticker.check()).toEqual(ok(undefined));
  });

  it("accepts a ticker built by the code under test", async () => {
    await expect(tickerLoop(MockTicker, 4)).resolves.toBe(4);
  });
});

describe("injected types", () => {
  it("mocks the timer", async () => {
    const state = { val: 0 };
    await addingWithTimer(state, Duration.seconds(1), MockTimer);

    expect(state.val).toBe(1);
  });

  it("mocks the ticker", async () => {
    const state = { val: 0 };
    const ticker = MockTicker.expect(1);
    await addingWithTicker(state, ticker);

    expect(state.val).toBe(1);
    expect(ticker.check()).toEqual(ok(undefined));
  });

  it("mocks the spawner inside a verification scope", async () => {
    await withVerification((scope) => {
      spawnTasks(scope.track(MockSpawner.expect(2)), MockTimer);
    });
  });
});
