import type { MonitorConfig } from "../config/env.js";
import { ExtractionError, NotificationError, toRecordedError, type RecordedError } from "../domain/errors.js";
import type {
  AnnouncementCandidate,
  CycleReport,
  MatchResult,
  MonitorState,
  StoredAnnouncement,
} from "../types/monitor.js";
import { describeError, logger } from "../utils/logger.js";
import { extractCandidates } from "./extractor.js";
import { findBestMatch, textSimilarity } from "./matcher.js";
import { createDefaultState, type MonitorStateStore } from "./monitor-state.js";
import { formatAnnouncementMessage, formatErrorAlert, type Notifier } from "./notifier.js";
import type { PageFetcher } from "./page-fetcher.js";

export type CycleSettings = Pick<
  MonitorConfig,
  "targetUrl" | "keywords" | "similarityThreshold" | "errorThrottleMinutes" | "monitoringEnabled"
> & {
  channelId: string;
  ownerChatId: string;
};

interface MonitorServiceOptions {
  settings: CycleSettings;
  fetcher: PageFetcher;
  notifier: Notifier;
  stateStore: MonitorStateStore;
  nowFn?: () => number;
}

export interface NoveltyDecision {
  isNew: boolean;
  announcement: StoredAnnouncement | null;
}

/**
 * A matched candidate is new when nothing is stored yet or when its text is
 * not similar enough to the stored one. A repeat keeps the stored record, so
 * `first_detected` survives repeated detections.
 */
export function decideNovelty(
  stored: StoredAnnouncement | null,
  match: MatchResult,
  threshold: number,
  nowIso: string,
): NoveltyDecision {
  if (!match.candidate) return { isNew: false, announcement: stored };

  if (stored && textSimilarity(match.candidate.text, stored.text) >= threshold) {
    return { isNew: false, announcement: stored };
  }

  return {
    isNew: true,
    announcement: {
      text: match.candidate.text,
      pdf_url: match.candidate.pdf_url,
      first_detected: nowIso,
    },
  };
}

export function shouldSendErrorAlert(
  state: Pick<MonitorState, "last_error_signature" | "last_error_time">,
  signature: string,
  nowMs: number,
  throttleMinutes: number,
): boolean {
  if (!state.last_error_signature || state.last_error_signature !== signature) return true;
  if (!state.last_error_time) return true;

  const lastAlertMs = Date.parse(state.last_error_time);
  if (!Number.isFinite(lastAlertMs)) return true;

  return nowMs - lastAlertMs > throttleMinutes * 60 * 1000;
}

export class MonitorService {
  private readonly settings: CycleSettings;
  private readonly fetcher: PageFetcher;
  private readonly notifier: Notifier;
  private readonly stateStore: MonitorStateStore;
  private readonly nowFn: () => number;

  constructor(options: MonitorServiceOptions) {
    this.settings = options.settings;
    this.fetcher = options.fetcher;
    this.notifier = options.notifier;
    this.stateStore = options.stateStore;
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  async runCycle(): Promise<CycleReport> {
    const startedAt = this.nowFn();
    const nowIso = new Date(startedAt).toISOString();
    const errors: RecordedError[] = [];

    let state = await this.loadState(errors);
    state = { ...state, monitoring_enabled: this.settings.monitoringEnabled };

    const report: CycleReport = {
      status: "success",
      candidateCount: 0,
      match: { candidate: null, score: 0 },
      isNewAnnouncement: false,
      announcementNotified: false,
      alertSent: false,
      errors,
      persisted: false,
      state,
    };

    if (!state.monitoring_enabled) {
      logger.info("monitoring_disabled", { targetUrl: this.settings.targetUrl });
      report.status = "disabled";
      report.state = { ...state, last_run_time: nowIso };
      // a recovered state document is still reported, without alerting the owner
      if (errors.length > 0) {
        report.state = {
          ...report.state,
          last_run_status: "failure",
          last_error_message: errors.map((item) => item.message).join("; "),
        };
      }
      report.persisted = await this.persist(report.state);
      return report;
    }

    logger.info("cycle_started", { targetUrl: this.settings.targetUrl, keywords: this.settings.keywords.length });

    try {
      const html = await this.fetcher.fetchPage(this.settings.targetUrl);
      const candidates = this.extract(html, errors);
      report.candidateCount = candidates.length;

      report.match = findBestMatch(candidates, this.settings.keywords, this.settings.similarityThreshold);
      logger.debug("match_evaluated", {
        candidates: candidates.length,
        score: report.match.score,
        matched: report.match.candidate !== null,
      });

      const decision = decideNovelty(
        state.last_announcement,
        report.match,
        this.settings.similarityThreshold,
        nowIso,
      );
      state = { ...state, last_announcement: decision.announcement };
      report.isNewAnnouncement = decision.isNew;

      if (decision.isNew && decision.announcement) {
        logger.info("announcement_detected", { text: decision.announcement.text, pdfUrl: decision.announcement.pdf_url });
        report.announcementNotified = await this.notifyAnnouncement(decision.announcement, errors);
      } else if (report.match.candidate) {
        logger.debug("announcement_already_seen", { text: report.match.candidate.text });
      }
    } catch (error) {
      logger.warn("cycle_step_failed", { error: describeError(error) });
      errors.push(toRecordedError(error));
    }

    if (errors.length > 0) {
      const message = errors.map((item) => item.message).join("; ");
      const signature = errors.map((item) => item.signature).join(" | ");
      state = { ...state, last_run_status: "failure", last_error_message: message };

      if (shouldSendErrorAlert(state, signature, startedAt, this.settings.errorThrottleMinutes)) {
        report.alertSent = await this.alertOwner(message);
        state = { ...state, last_error_signature: signature, last_error_time: nowIso };
      } else {
        logger.info("owner_alert_suppressed", { signature, lastAlertAt: state.last_error_time });
      }
      report.status = "failure";
    } else {
      state = {
        ...state,
        last_run_status: "success",
        last_error_message: null,
        last_error_signature: null,
        last_error_time: null,
      };
    }

    state = { ...state, last_run_time: nowIso };
    report.state = state;
    report.persisted = await this.persist(state);

    logger.info("cycle_finished", {
      status: report.status,
      candidates: report.candidateCount,
      newAnnouncement: report.isNewAnnouncement,
      errors: errors.length,
      durationMs: this.nowFn() - startedAt,
    });
    return report;
  }

  private async loadState(errors: RecordedError[]): Promise<MonitorState> {
    try {
      return await this.stateStore.load();
    } catch (error) {
      logger.warn("state_load_failed", { error: describeError(error) });
      errors.push(toRecordedError(error));
      return createDefaultState();
    }
  }

  private extract(html: string, errors: RecordedError[]): AnnouncementCandidate[] {
    try {
      return [...extractCandidates(html, this.settings.targetUrl)];
    } catch (error) {
      if (!(error instanceof ExtractionError)) throw error;
      logger.warn("extraction_failed", { error: error.message });
      errors.push(toRecordedError(error));
      return [];
    }
  }

  private async notifyAnnouncement(announcement: StoredAnnouncement, errors: RecordedError[]): Promise<boolean> {
    const result = await this.notifier.send(
      formatAnnouncementMessage(announcement, this.settings.targetUrl),
      this.settings.channelId,
    );
    if (result.ok) return true;

    logger.warn("announcement_notify_failed", { error: result.message });
    errors.push(toRecordedError(new NotificationError(result.message)));
    return false;
  }

  private async alertOwner(message: string): Promise<boolean> {
    const result = await this.notifier.send(formatErrorAlert(message), this.settings.ownerChatId);
    if (!result.ok) {
      logger.warn("owner_alert_failed", { error: result.message });
    }
    return result.ok;
  }

  private async persist(state: MonitorState): Promise<boolean> {
    try {
      await this.stateStore.save(state);
      return true;
    } catch (error) {
      logger.error("state_save_failed", { error: describeError(error) });
      return false;
    }
  }
}

export function createCycleSettings(config: MonitorConfig): CycleSettings {
  return {
    targetUrl: config.targetUrl,
    keywords: config.keywords,
    similarityThreshold: config.similarityThreshold,
    errorThrottleMinutes: config.errorThrottleMinutes,
    monitoringEnabled: config.monitoringEnabled,
    channelId: config.telegram.channelId,
    ownerChatId: config.telegram.ownerChatId,
  };
}
