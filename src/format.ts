import type { ChangeRecord } from "./types.js";
import { escapeMrkdwn, formatUtcTimestamp } from "./utils.js";

export const DEFAULT_MAX_NOTES_LENGTH = 500;
export const TRUNCATION_MARKER = "...";
// chat.postMessage rejects messages with more blocks than this
export const MAX_BLOCKS = 50;
const MAX_SUMMARY_LENGTH = 2900;

const FIRST_OBSERVATION_ICON = "🆕";
const RELEASE_ICON = "📱";

export interface TextObject {
  type: "plain_text" | "mrkdwn";
  text: string;
  emoji?: boolean;
}

export type SlackBlock =
  | { type: "header"; text: TextObject }
  | { type: "section"; text: TextObject }
  | { type: "section"; fields: TextObject[] }
  | { type: "divider" };

/** One consolidated Slack message for a polling cycle. */
export interface NotificationPayload {
  text: string; // fallback for clients that cannot render blocks
  blocks: SlackBlock[];
}

export interface FormatOptions {
  maxNotesLength?: number;
}

/** Cuts by code point so an emoji is never split in half. */
export function truncateNotes(notes: string, maxLength: number = DEFAULT_MAX_NOTES_LENGTH): string {
  const chars = Array.from(notes);
  if (chars.length <= maxLength) return notes;
  return `${chars.slice(0, maxLength).join("")}${TRUNCATION_MARKER}`;
}

function iconFor(change: ChangeRecord): string {
  return change.kind === "first_observation" ? FIRST_OBSERVATION_ICON : RELEASE_ICON;
}

function versionLine(change: ChangeRecord): string {
  const current = escapeMrkdwn(change.app.version);
  if (change.kind === "new_release") {
    return `${escapeMrkdwn(change.previousVersion)} → ${current}`;
  }
  return current;
}

function appBlocks(change: ChangeRecord, maxNotesLength: number | null): SlackBlock[] {
  const { app } = change;
  const blocks: SlackBlock[] = [
    {
      type: "section",
      fields: [
        { type: "mrkdwn", text: `${iconFor(change)} *${escapeMrkdwn(app.name)}*\n${escapeMrkdwn(app.developer)}` },
        {
          type: "mrkdwn",
          text: `*Version:* ${versionLine(change)}\n*Updated:* ${formatUtcTimestamp(app.lastUpdated)}`,
        },
        { type: "mrkdwn", text: `<${app.url}|${RELEASE_ICON} App Store>` },
      ],
    },
  ];

  const notes = app.releaseNotes ?? "";
  if (maxNotesLength !== null && notes.trim()) {
    blocks.push({
      type: "section",
      text: {
        type: "mrkdwn",
        text: `*What's New:*\n\`\`\`${escapeMrkdwn(truncateNotes(notes, maxNotesLength))}\`\`\``,
      },
    });
  }

  return blocks;
}

function joinWithDividers(groups: SlackBlock[][]): SlackBlock[] {
  const blocks: SlackBlock[] = [];
  groups.forEach((group, index) => {
    if (index > 0) blocks.push({ type: "divider" });
    blocks.push(...group);
  });
  return blocks;
}

// "…and 3 more: Alpha v2.3, Beta v1.0, Gamma v4"
function overflowSummary(rest: readonly ChangeRecord[]): SlackBlock {
  let text = `…and ${rest.length} more: `;
  const entries = rest.map((c) => `${escapeMrkdwn(c.app.name)} v${escapeMrkdwn(c.app.version)}`);
  for (const [index, entry] of entries.entries()) {
    const piece = index === 0 ? entry : `, ${entry}`;
    if (text.length + piece.length > MAX_SUMMARY_LENGTH) {
      text += ", …";
      break;
    }
    text += piece;
  }
  return { type: "section", text: { type: "mrkdwn", text } };
}

/**
 * Builds the single message for a cycle's changes, in the order given.
 * Returns null when there is nothing to report.
 *
 * Kept within MAX_BLOCKS: release notes are dropped first, then apps past
 * the limit are listed in one trailing summary section.
 */
export function formatNotification(
  changes: readonly ChangeRecord[],
  options: FormatOptions = {}
): NotificationPayload | null {
  if (changes.length === 0) return null;

  const maxNotesLength = options.maxNotesLength ?? DEFAULT_MAX_NOTES_LENGTH;
  const anyFirst = changes.some((c) => c.kind === "first_observation");
  const title = `${anyFirst ? FIRST_OBSERVATION_ICON : RELEASE_ICON} App Updates (${changes.length})`;
  const header: SlackBlock = { type: "header", text: { type: "plain_text", text: title, emoji: true } };

  const full = joinWithDividers(changes.map((c) => appBlocks(c, maxNotesLength)));
  if (full.length + 1 <= MAX_BLOCKS) {
    return { text: title, blocks: [header, ...full] };
  }

  const compact = joinWithDividers(changes.map((c) => appBlocks(c, null)));
  if (compact.length + 1 <= MAX_BLOCKS) {
    return { text: title, blocks: [header, ...compact] };
  }

  // header + shown apps with dividers + divider + summary
  const shown = Math.floor((MAX_BLOCKS - 2) / 2);
  const blocks = joinWithDividers([
    ...changes.slice(0, shown).map((c) => appBlocks(c, null)),
    [overflowSummary(changes.slice(shown))],
  ]);
  return { text: title, blocks: [header, ...blocks] };
}
