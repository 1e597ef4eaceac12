import type { MonitorState } from "../types/monitor.js";
import { escapeHtml } from "./html.js";

const ANNOUNCEMENT_MAX_AGE_DAYS = 30;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** `2026-10-19 08:05 UTC`; unparseable input is shown as-is. */
export function formatTimestamp(iso: string): string {
  const ms = Date.parse(iso);
  if (!Number.isFinite(ms)) return iso;
  return `${new Date(ms).toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

function row(label: string, value: string, modifier?: string): string {
  const className = modifier ? `status-value status-value--${modifier}` : "status-value";
  return `<div class="status-row"><span class="status-label">${label}</span><span class="${className}">${value}</span></div>`;
}

function renderAnnouncement(state: MonitorState, nowMs: number): string {
  const announcement = state.last_announcement;
  const detectedMs = announcement ? Date.parse(announcement.first_detected) : Number.NaN;
  const ageDays = Math.floor((nowMs - detectedMs) / MS_PER_DAY);

  if (!announcement || !Number.isFinite(detectedMs) || ageDays > ANNOUNCEMENT_MAX_AGE_DAYS) {
    return `<p class="announcement-empty">No matching announcement in the last ${ANNOUNCEMENT_MAX_AGE_DAYS} days.</p>`;
  }

  const pdf = announcement.pdf_url
    ? `<p class="announcement-link"><a href="${escapeHtml(announcement.pdf_url)}" rel="noopener">Open PDF</a></p>`
    : "";

  return [
    `<article class="announcement-card">`,
    `<p class="announcement-text">${escapeHtml(announcement.text)}</p>`,
    `<p class="announcement-date">First detected ${escapeHtml(formatTimestamp(announcement.first_detected))}</p>`,
    pdf,
    `</article>`,
  ]
    .filter(Boolean)
    .join("");
}

export function renderStatusPage(state: MonitorState, nowMs: number): string {
  const result =
    state.last_run_status === "success"
      ? row("Last result", "Success", "ok")
      : state.last_run_status === "failure"
        ? row("Last result", "Failure", "failed")
        : row("Last result", "Unknown", "muted");

  const rows = [
    row("Monitoring", state.monitoring_enabled ? "ON" : "OFF", state.monitoring_enabled ? undefined : "muted"),
    row("Last run", state.last_run_time ? escapeHtml(formatTimestamp(state.last_run_time)) : "Never"),
    result,
    state.last_error_message ? row("Last error", escapeHtml(state.last_error_message)) : row("Last error", "None", "muted"),
  ];

  return (
    `<!doctype html>` +
    `<html lang="en"><head><meta charset="utf-8">` +
    `<meta name="viewport" content="width=device-width, initial-scale=1">` +
    `<title>Announcement monitor</title></head><body>` +
    `<main><h1>Announcement monitor</h1>` +
    `<section class="status">${rows.join("")}</section>` +
    `<section class="announcement"><h2>Latest announcement</h2>${renderAnnouncement(state, nowMs)}</section>` +
    `</main></body></html>`
  );
}
