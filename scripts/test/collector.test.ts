import { describe, expect, it, vi } from "vitest";

import { collect, describeMetrics, STATUS_DESCRIPTOR } from "../src/metrics/collector.js";

import type {
  MetricDescriptor,
  ObjectScrapeDescriptor,
  Observation,
  ValueScrapeDescriptor
} from "lib/metrics/types.js";

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function valueMetric(overrides: Partial<ValueScrapeDescriptor> = {}): ValueScrapeDescriptor {
  return {
    type: "value",
    name: "example_global_value",
    help: "Example global value",
    labelNames: [],
    labelPaths: [],
    valueType: "gauge",
    keyPath: "{.counter}",
    ...overrides
  };
}

function objectMetric(overrides: Partial<ObjectScrapeDescriptor> = {}): ObjectScrapeDescriptor {
  return {
    type: "object",
    name: "example_items",
    help: "Example items",
    labelNames: ["status"],
    labelPaths: ["$.status"],
    valueType: "gauge",
    keyPath: "items",
    valuePath: "v",
    ...overrides
  };
}

function run(descriptors: MetricDescriptor[], payload: string | Uint8Array, log = spyLogger()): Observation[] {
  return Array.from(collect(descriptors, payload, { logger: log }));
}

const ITEMS_PAYLOAD = JSON.stringify({
  status: "up",
  items: [{ v: "3" }, { v: "bad" }, { v: "5" }]
});

describe("collect", () => {
  it("emits only the status observation when nothing is configured", () => {
    const observations = run([], "{}");
    expect(observations).toEqual([{ descriptor: STATUS_DESCRIPTOR, value: 0, labels: [] }]);
    expect(observations[0]?.descriptor.name).toBe("json_exporter_status");
  });

  it("scrapes a scalar value with labels from the root document", () => {
    const metric = valueMetric({ labelNames: ["environment"], labelPaths: ["$.env"] });
    const observations = run([metric], JSON.stringify({ counter: "1234", env: "beta" }));

    expect(observations).toHaveLength(2);
    expect(observations[1]).toEqual({ descriptor: metric, value: 1234, labels: ["beta"] });
  });

  it("skips a scalar metric whose value is not numeric", () => {
    const log = spyLogger();
    const observations = run([valueMetric()], JSON.stringify({ counter: "many" }), log);

    expect(observations).toHaveLength(1);
    expect(log.error).toHaveBeenCalledWith(
      "Failed to convert extracted value to a number",
      expect.objectContaining({ path: "{.counter}", value: "many", metric: "example_global_value" })
    );
  });

  it("skips a scalar metric whose path has no match", () => {
    const log = spyLogger();
    const observations = run([valueMetric({ keyPath: "$.absent" })], "{}", log);

    expect(observations).toHaveLength(1);
    expect(log.error).toHaveBeenCalledWith(
      "Failed to extract value for metric",
      expect.objectContaining({ path: "$.absent", reason: "no-match" })
    );
  });

  it("emits one observation per surviving array element in document order", () => {
    const log = spyLogger();
    const observations = run([objectMetric()], ITEMS_PAYLOAD, log);

    expect(observations.slice(1).map((o) => o.value)).toEqual([3, 5]);
    expect(observations.slice(1).map((o) => o.labels)).toEqual([["up"], ["up"]]);
    expect(log.error).toHaveBeenCalledTimes(1);
    expect(log.error).toHaveBeenCalledWith(
      "Failed to convert extracted value to a number",
      expect.objectContaining({ path: "v", value: "bad", metric: "example_items" })
    );
  });

  it("skips elements whose value path does not match and keeps going", () => {
    const payload = JSON.stringify({ status: "up", items: [{ v: 1 }, { w: 2 }, { v: 3 }] });
    const observations = run([objectMetric()], payload);
    expect(observations.slice(1).map((o) => o.value)).toEqual([1, 3]);
  });

  it("reads scalar array elements through the current-scope anchor", () => {
    const log = spyLogger();
    const metric = objectMetric({ keyPath: "{.xs[*]}", valuePath: "{@}", labelNames: [], labelPaths: [] });

    const observations = run([metric], JSON.stringify({ xs: [1, 2, 3] }), log);
    expect(observations.slice(1).map((o) => o.value)).toEqual([1, 2, 3]);
    expect(log.error).not.toHaveBeenCalled();
  });

  it("fans out over nested arrays selected by a wildcard", () => {
    const metric = objectMetric({ keyPath: "{.xs[*]}", valuePath: "{[0]}", labelNames: [], labelPaths: [] });

    const observations = run([metric], JSON.stringify({ xs: [[7, 8]] }));
    expect(observations.slice(1).map((o) => o.value)).toEqual([7]);
  });

  it("prefers the root document for root-anchored label paths", () => {
    const metric = objectMetric({ labelNames: ["root_status", "item_status"], labelPaths: ["$.status", "{.status}"] });
    const payload = JSON.stringify({ status: "up", items: [{ status: "down", v: 1 }] });

    const observations = run([metric], payload);
    expect(observations[1]?.labels).toEqual(["up", "down"]);
  });

  it("keeps label cardinality when a label path fails", () => {
    const metric = objectMetric({ labelNames: ["id", "status"], labelPaths: ["{.id}", "$.status"] });
    const observations = run([metric], ITEMS_PAYLOAD);
    expect(observations[1]?.labels).toEqual(["", "up"]);
  });

  it("remaps values before parsing them", () => {
    const log = spyLogger();
    const metric = objectMetric({
      valuePath: "{.state}",
      valueConverter: new Map([["{.state}", new Map([["down", "0"], ["up", "1"]])]])
    });
    const payload = JSON.stringify({
      status: "up",
      items: [{ state: "UP" }, { state: "down" }, { state: "unknown" }]
    });

    const observations = run([metric], payload, log);
    expect(observations.slice(1).map((o) => o.value)).toEqual([1, 0]);
    expect(log.error).toHaveBeenCalledWith(
      "Failed to convert extracted value to a number",
      expect.objectContaining({ value: "unknown" })
    );
  });

  it("skips an object metric whose key path has no match", () => {
    const log = spyLogger();
    const observations = run([objectMetric({ keyPath: "{.missing[*]}" })], ITEMS_PAYLOAD, log);

    expect(observations).toHaveLength(1);
    expect(log.error).toHaveBeenCalledWith(
      "Failed to extract json objects for metric",
      expect.objectContaining({ path: "{.missing[*]}", reason: "no-match" })
    );
  });

  it("treats a single matched object as a one-element array", () => {
    const payload = JSON.stringify({ status: "up", items: { v: 9 } });
    const observations = run([objectMetric()], payload);
    expect(observations.slice(1).map((o) => o.value)).toEqual([9]);
  });

  it("attaches epoch timestamps when they resolve", () => {
    const metric = objectMetric({ epochTimestampPath: "{.ts}" });
    const payload = JSON.stringify({ status: "up", items: [{ v: 1, ts: 1700000000000 }, { v: 2, ts: "soon" }] });

    const observations = run([metric], payload);
    expect(observations[1]?.timestampMs).toBe(1700000000000);
    expect(observations[2]).toEqual({ descriptor: metric, value: 2, labels: ["up"] });
  });

  it("logs unknown scrape kinds and continues with the next metric", () => {
    const log = spyLogger();
    const anomaly: MetricDescriptor = JSON.parse(
      "{\"type\":\"histogram\",\"name\":\"odd\",\"labelNames\":[],\"labelPaths\":[]}"
    );
    const observations = run([anomaly, valueMetric()], JSON.stringify({ counter: 7 }), log);

    expect(observations.map((o) => o.value)).toEqual([0, 7]);
    expect(log.error).toHaveBeenCalledWith("Unknown scrape config type", { type: "histogram", metric: "odd" });
  });

  it("emits the status observation exactly once when every metric fails", () => {
    const observations = run([valueMetric({ keyPath: "$.x" }), objectMetric({ keyPath: "$.y" })], "{}");
    expect(observations).toEqual([{ descriptor: STATUS_DESCRIPTOR, value: 0, labels: [] }]);
  });

  it("emits only the status observation for a malformed payload", () => {
    const log = spyLogger();
    const observations = run([valueMetric()], "{\"counter\":", log);

    expect(observations).toHaveLength(1);
    expect(log.error).toHaveBeenCalledWith("Failed to parse JSON payload", expect.anything());
  });

  it("accepts raw bytes", () => {
    const observations = run([valueMetric()], Buffer.from("{\"counter\": 12.5}"));
    expect(observations[1]?.value).toBe(12.5);
  });

  it("yields the status observation before reading the payload", () => {
    const iterator = collect([valueMetric()], "{\"counter\": 1}", { logger: spyLogger() });
    expect(iterator.next().value).toEqual({ descriptor: STATUS_DESCRIPTOR, value: 0, labels: [] });
  });

  it("keeps separate runs independent", () => {
    const metric = valueMetric();
    const first = collect([metric], "{\"counter\": 1}", { logger: spyLogger() });
    const second = collect([metric], "{\"counter\": 2}", { logger: spyLogger() });

    first.next();
    second.next();
    const fromSecond = second.next();
    const fromFirst = first.next();
    expect(fromSecond.done ? null : fromSecond.value.value).toBe(2);
    expect(fromFirst.done ? null : fromFirst.value.value).toBe(1);
  });
});

describe("describeMetrics", () => {
  it("lists the status metric before the configured ones", () => {
    const described = describeMetrics([valueMetric(), objectMetric({ valueType: "counter" })]);

    expect(described.map((d) => d.name)).toEqual(["json_exporter_status", "example_global_value", "example_items"]);
    expect(described[2]).toEqual({
      name: "example_items",
      help: "Example items",
      labelNames: ["status"],
      valueType: "counter"
    });
  });
});
