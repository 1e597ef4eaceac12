import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { FetchError } from "../src/domain/errors.js";
import {
  decideNovelty,
  MonitorService,
  shouldSendErrorAlert,
  type CycleSettings,
} from "../src/services/monitor-service.js";
import {
  createDefaultState,
  FileBackedMonitorStateStore,
  InMemoryMonitorStateStore,
  type MonitorStateStore,
} from "../src/services/monitor-state.js";
import type { NotificationResult, Notifier } from "../src/services/notifier.js";
import type { PageFetcher } from "../src/services/page-fetcher.js";
import type { MonitorState } from "../src/types/monitor.js";

const T0 = Date.parse("2026-10-19T08:00:00.000Z");
const MINUTE = 60 * 1000;

const PAGE_WITH_MATCH = `
  <ul>
    <li>Holiday list</li>
    <li><a href="/notices/arrear.pdf">arrear-exam!!!</a></li>
  </ul>`;

const SETTINGS: CycleSettings = {
  targetUrl: "https://college.example.edu/",
  keywords: ["arrear exam"],
  similarityThreshold: 0.6,
  errorThrottleMinutes: 60,
  monitoringEnabled: true,
  channelId: "@announcements",
  ownerChatId: "owner-1",
};

class RecordingNotifier implements Notifier {
  readonly sent: Array<{ text: string; destinationId: string }> = [];
  readonly failingDestinations = new Set<string>();

  async send(text: string, destinationId: string): Promise<NotificationResult> {
    this.sent.push({ text, destinationId });
    if (this.failingDestinations.has(destinationId)) {
      return { ok: false, message: "channel unavailable" };
    }
    return { ok: true };
  }

  to(destinationId: string): string[] {
    return this.sent.filter((message) => message.destinationId === destinationId).map((message) => message.text);
  }
}

class StubFetcher implements PageFetcher {
  calls = 0;

  constructor(private respond: () => Promise<string>) {}

  setResponse(respond: () => Promise<string>): void {
    this.respond = respond;
  }

  async fetchPage(): Promise<string> {
    this.calls += 1;
    return this.respond();
  }
}

function makeHarness(options: { settings?: Partial<CycleSettings>; store?: MonitorStateStore; page?: string } = {}) {
  let nowMs = T0;
  const notifier = new RecordingNotifier();
  const fetcher = new StubFetcher(async () => options.page ?? PAGE_WITH_MATCH);
  const store = options.store ?? new InMemoryMonitorStateStore();
  const service = new MonitorService({
    settings: { ...SETTINGS, ...options.settings },
    fetcher,
    notifier,
    stateStore: store,
    nowFn: () => nowMs,
  });

  return {
    service,
    notifier,
    fetcher,
    store,
    setNow: (value: number) => {
      nowMs = value;
    },
  };
}

describe("MonitorService.runCycle", () => {
  test("a first match is announced once and recorded with the run time", async () => {
    const { service, notifier, store } = makeHarness();

    const report = await service.runCycle();

    expect(report.status).toBe("success");
    expect(report.candidateCount).toBe(2);
    expect(report.match.score).toBeCloseTo(0.8, 10);
    expect(report.isNewAnnouncement).toBe(true);
    expect(report.announcementNotified).toBe(true);
    expect(report.persisted).toBe(true);
    expect(notifier.to("@announcements")).toHaveLength(1);
    expect(notifier.to("@announcements")[0]).toContain("\narrear-exam!!!\n");
    expect(notifier.to("owner-1")).toEqual([]);

    expect(await store.load()).toEqual({
      monitoring_enabled: true,
      last_run_time: "2026-10-19T08:00:00.000Z",
      last_run_status: "success",
      last_error_message: null,
      last_error_signature: null,
      last_error_time: null,
      last_announcement: {
        text: "arrear-exam!!!",
        pdf_url: "https://college.example.edu/notices/arrear.pdf",
        first_detected: "2026-10-19T08:00:00.000Z",
      },
    });
  });

  test("an unchanged page does not notify twice", async () => {
    const { service, notifier, store, setNow } = makeHarness();

    await service.runCycle();
    setNow(T0 + 24 * 60 * MINUTE);
    const second = await service.runCycle();

    expect(second.isNewAnnouncement).toBe(false);
    expect(notifier.to("@announcements")).toHaveLength(1);
    const state = await store.load();
    expect(state.last_announcement?.first_detected).toBe("2026-10-19T08:00:00.000Z");
    expect(state.last_run_time).toBe("2026-10-20T08:00:00.000Z");
  });

  test("near-identical text against the stored announcement is not new", async () => {
    const stored = {
      ...createDefaultState(),
      last_announcement: {
        text: "Arrear exam results published",
        pdf_url: null,
        first_detected: "2026-10-01T08:00:00.000Z",
      },
    };
    const { service, notifier, store } = makeHarness({
      store: new InMemoryMonitorStateStore(stored),
      page: "<ul><li>Arrear exam results  published.</li></ul>",
    });

    const report = await service.runCycle();

    expect(report.match.candidate?.text).toBe("Arrear exam results published.");
    expect(report.isNewAnnouncement).toBe(false);
    expect(notifier.sent).toEqual([]);
    expect((await store.load()).last_announcement).toEqual(stored.last_announcement);
  });

  test("sufficiently different text replaces the stored announcement", async () => {
    const { service, notifier, store } = makeHarness({
      store: new InMemoryMonitorStateStore({
        ...createDefaultState(),
        last_announcement: {
          text: "Arrear exam results published",
          pdf_url: null,
          first_detected: "2026-10-01T08:00:00.000Z",
        },
      }),
      page: "<ul><li>Timetable for arrear exam in November</li></ul>",
    });

    const report = await service.runCycle();

    expect(report.isNewAnnouncement).toBe(true);
    expect(notifier.to("@announcements")).toHaveLength(1);
    expect((await store.load()).last_announcement).toEqual({
      text: "Timetable for arrear exam in November",
      pdf_url: null,
      first_detected: "2026-10-19T08:00:00.000Z",
    });
  });

  test("disabled monitoring skips the fetch and keeps the announcement", async () => {
    const initial: MonitorState = {
      ...createDefaultState(),
      last_run_status: "success",
      last_announcement: { text: "Old notice", pdf_url: null, first_detected: "2026-10-01T08:00:00.000Z" },
    };
    const { service, fetcher, notifier, store } = makeHarness({
      settings: { monitoringEnabled: false },
      store: new InMemoryMonitorStateStore(initial),
    });

    const report = await service.runCycle();

    expect(report.status).toBe("disabled");
    expect(fetcher.calls).toBe(0);
    expect(notifier.sent).toEqual([]);
    expect(await store.load()).toEqual({
      ...initial,
      monitoring_enabled: false,
      last_run_time: "2026-10-19T08:00:00.000Z",
    });
  });

  test("a page without candidates is a successful run without a match", async () => {
    const { service, notifier, store } = makeHarness({ page: "<html><body><p>Closed for maintenance</p></body></html>" });

    const report = await service.runCycle();

    expect(report.status).toBe("success");
    expect(report.candidateCount).toBe(0);
    expect(report.match).toEqual({ candidate: null, score: 0 });
    expect(notifier.sent).toEqual([]);
    expect((await store.load()).last_announcement).toBeNull();
  });

  test("repeated identical fetch failures alert the owner once per throttle window", async () => {
    const { service, fetcher, notifier, store, setNow } = makeHarness();
    fetcher.setResponse(async () => {
      throw new FetchError("http_status", "HTTP 503", { status: 503 });
    });

    const first = await service.runCycle();
    expect(first.status).toBe("failure");
    expect(first.alertSent).toBe(true);
    expect(notifier.to("owner-1")).toEqual(["⚠️ <b>Monitoring error</b>\n\n<code>FetchError: HTTP 503</code>"]);
    expect(await store.load()).toMatchObject({
      last_run_status: "failure",
      last_error_message: "FetchError: HTTP 503",
      last_error_signature: "FetchError:http_status: HTTP 503",
      last_error_time: "2026-10-19T08:00:00.000Z",
    });

    setNow(T0 + 30 * MINUTE);
    const second = await service.runCycle();
    expect(second.status).toBe("failure");
    expect(second.alertSent).toBe(false);
    expect(notifier.to("owner-1")).toHaveLength(1);
    expect(await store.load()).toMatchObject({
      last_run_time: "2026-10-19T08:30:00.000Z",
      last_error_message: "FetchError: HTTP 503",
      last_error_time: "2026-10-19T08:00:00.000Z",
    });

    setNow(T0 + 61 * MINUTE);
    const third = await service.runCycle();
    expect(third.alertSent).toBe(true);
    expect(notifier.to("owner-1")).toHaveLength(2);
    expect((await store.load()).last_error_time).toBe("2026-10-19T09:01:00.000Z");
  });

  test("a different error signature alerts immediately", async () => {
    const { service, fetcher, notifier, setNow } = makeHarness();
    fetcher.setResponse(async () => {
      throw new FetchError("http_status", "HTTP 503", { status: 503 });
    });
    await service.runCycle();

    fetcher.setResponse(async () => {
      throw new FetchError("timeout", "Request timed out after 30000ms");
    });
    setNow(T0 + 5 * MINUTE);
    await service.runCycle();

    expect(notifier.to("owner-1")).toEqual([
      "⚠️ <b>Monitoring error</b>\n\n<code>FetchError: HTTP 503</code>",
      "⚠️ <b>Monitoring error</b>\n\n<code>FetchError: Request timed out after 30000ms</code>",
    ]);
  });

  test("a successful run clears the recorded error", async () => {
    const { service, fetcher, store, setNow } = makeHarness();
    fetcher.setResponse(async () => {
      throw new FetchError("network", "Network error: ECONNRESET");
    });
    await service.runCycle();

    fetcher.setResponse(async () => PAGE_WITH_MATCH);
    setNow(T0 + 10 * MINUTE);
    const report = await service.runCycle();

    expect(report.status).toBe("success");
    expect(await store.load()).toMatchObject({
      last_run_status: "success",
      last_error_message: null,
      last_error_signature: null,
      last_error_time: null,
    });
  });

  test("unexpected errors are recorded instead of escaping the cycle", async () => {
    const { service, fetcher, store } = makeHarness();
    fetcher.setResponse(async () => {
      throw new RangeError("invalid array length");
    });

    const report = await service.runCycle();

    expect(report.errors.map((error) => error.signature)).toEqual(["UnexpectedError:unknown: invalid array length"]);
    expect((await store.load()).last_error_message).toBe("UnexpectedError: invalid array length");
  });

  test("a failed public notification keeps the announcement as seen", async () => {
    const { service, notifier, store, setNow } = makeHarness();
    notifier.failingDestinations.add("@announcements");

    const first = await service.runCycle();

    expect(first.status).toBe("failure");
    expect(first.announcementNotified).toBe(false);
    expect(notifier.to("owner-1")).toEqual([
      "⚠️ <b>Monitoring error</b>\n\n<code>NotificationError: channel unavailable</code>",
    ]);
    expect(await store.load()).toMatchObject({
      last_run_status: "failure",
      last_error_message: "NotificationError: channel unavailable",
      last_announcement: { text: "arrear-exam!!!", first_detected: "2026-10-19T08:00:00.000Z" },
    });

    setNow(T0 + 60 * MINUTE);
    const second = await service.runCycle();

    expect(second.status).toBe("success");
    expect(notifier.to("@announcements")).toHaveLength(1);
  });

  test("a corrupt state document is replaced and reported", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "monitor-cycle-"));
    try {
      const statePath = path.join(dir, "state.json");
      await fs.writeFile(statePath, "{ not json", "utf8");
      const { service, notifier } = makeHarness({ store: new FileBackedMonitorStateStore(statePath) });

      const report = await service.runCycle();

      expect(report.status).toBe("failure");
      expect(report.persisted).toBe(true);
      expect(report.errors.map((error) => error.signature)).toEqual([
        "StateCorruptionError:invalid_json: State document is not valid JSON",
      ]);
      expect(notifier.to("@announcements")).toHaveLength(1);
      expect(notifier.to("owner-1")).toHaveLength(1);

      const persisted: unknown = JSON.parse(await fs.readFile(statePath, "utf8"));
      expect(persisted).toMatchObject({
        last_run_status: "failure",
        last_error_message: "StateCorruptionError: State document is not valid JSON",
        last_error_signature: "StateCorruptionError:invalid_json: State document is not valid JSON",
        last_announcement: { text: "arrear-exam!!!" },
      });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  test("a corrupt state document is reported even while monitoring is disabled", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "monitor-cycle-"));
    try {
      const statePath = path.join(dir, "state.json");
      await fs.writeFile(statePath, "{ not json", "utf8");
      const { service, fetcher, notifier } = makeHarness({
        settings: { monitoringEnabled: false },
        store: new FileBackedMonitorStateStore(statePath),
      });

      const report = await service.runCycle();

      expect(report.status).toBe("disabled");
      expect(report.persisted).toBe(true);
      expect(fetcher.calls).toBe(0);
      expect(notifier.sent).toEqual([]);

      const persisted: unknown = JSON.parse(await fs.readFile(statePath, "utf8"));
      expect(persisted).toEqual({
        monitoring_enabled: false,
        last_run_time: "2026-10-19T08:00:00.000Z",
        last_run_status: "failure",
        last_error_message: "StateCorruptionError: State document is not valid JSON",
        last_error_signature: null,
        last_error_time: null,
        last_announcement: null,
      });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  test("a state document that cannot be saved is reported as not persisted", async () => {
    class ReadOnlyStore extends InMemoryMonitorStateStore {
      override async save(): Promise<void> {
        throw new Error("EROFS: read-only file system");
      }
    }
    const { service } = makeHarness({ store: new ReadOnlyStore() });

    const report = await service.runCycle();

    expect(report.status).toBe("success");
    expect(report.persisted).toBe(false);
  });
});

describe("decideNovelty", () => {
  const match = { candidate: { text: "Arrear exam results", pdf_url: null }, score: 1 };

  test("no match keeps whatever is stored", () => {
    const stored = { text: "Old", pdf_url: null, first_detected: "2026-10-01T00:00:00.000Z" };
    expect(decideNovelty(stored, { candidate: null, score: 0.2 }, 0.6, "now")).toEqual({
      isNew: false,
      announcement: stored,
    });
  });

  test("nothing stored means new", () => {
    expect(decideNovelty(null, match, 0.6, "2026-10-19T08:00:00.000Z")).toEqual({
      isNew: true,
      announcement: { text: "Arrear exam results", pdf_url: null, first_detected: "2026-10-19T08:00:00.000Z" },
    });
  });
});

describe("shouldSendErrorAlert", () => {
  const signature = "FetchError:http_status: HTTP 503";

  test("alerts without a previous alert or with another signature", () => {
    expect(shouldSendErrorAlert({ last_error_signature: null, last_error_time: null }, signature, T0, 60)).toBe(true);
    expect(
      shouldSendErrorAlert(
        { last_error_signature: "FetchError:timeout: x", last_error_time: new Date(T0).toISOString() },
        signature,
        T0,
        60,
      ),
    ).toBe(true);
  });

  test("throttles within the window and alerts once it has elapsed", () => {
    const previous = { last_error_signature: signature, last_error_time: new Date(T0).toISOString() };
    expect(shouldSendErrorAlert(previous, signature, T0 + 60 * MINUTE, 60)).toBe(false);
    expect(shouldSendErrorAlert(previous, signature, T0 + 60 * MINUTE + 1, 60)).toBe(true);
  });

  test("an unparseable alert time does not suppress alerts", () => {
    expect(shouldSendErrorAlert({ last_error_signature: signature, last_error_time: "yesterday" }, signature, T0, 60)).toBe(
      true,
    );
  });
});
