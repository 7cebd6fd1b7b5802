import { fullName, type ActivityEvent, type ReportItem } from "../tracking/types.js";

/** Telegram rejects messages longer than this. */
export const MAX_MESSAGE_LENGTH = 4096;

const MAX_QUOTE_LENGTH = 600;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function link(url: string, text: string): string {
  return `<a href="${escapeHtml(url)}">${escapeHtml(text)}</a>`;
}

function quote(text: string | null): string[] {
  const trimmed = text?.trim();
  if (!trimmed) return [];
  const excerpt =
    trimmed.length > MAX_QUOTE_LENGTH ? `${trimmed.slice(0, MAX_QUOTE_LENGTH)}…` : trimmed;
  return [`<blockquote>${escapeHtml(excerpt)}</blockquote>`];
}

function byline(login: string | undefined): string {
  return login ? ` (@${escapeHtml(login)})` : "";
}

const ISSUEOID_LABEL = {
  issue: "ISSUE",
  pullRequest: "PR",
  discussion: "DISCUSSION",
} as const;

function formatEvent(event: ActivityEvent): string[] {
  const repo = `<b>[${escapeHtml(fullName(event.repo))}]</b>`;
  switch (event.type) {
    case "issue":
    case "pullRequest":
    case "discussion": {
      const number = link(event.url, `#${event.number}`);
      const title = `${escapeHtml(event.title)}${byline(event.author?.login)}`;
      return [`${repo} ${ISSUEOID_LABEL[event.type]} ${number}: ${title}`];
    }
    case "release": {
      let head = `${repo} RELEASE ${link(event.url, event.tagName)}`;
      if (event.draft) head += " [draft]";
      if (event.prerelease) head += " [prerelease]";
      if (event.name) head += `: ${escapeHtml(event.name)}`;
      head += byline(event.author?.login);
      return [head, ...quote(event.description)];
    }
    case "tag": {
      const tag = link(`${event.repo.url}/releases/tag/${event.name}`, event.name);
      return [`${repo} TAG ${tag}${byline(event.user?.login)}`];
    }
    case "star": {
      const starred = link(event.repo.url, fullName(event.repo));
      return [`★ @${escapeHtml(event.user.login)} starred ${starred}`];
    }
    case "fork": {
      const fork = link(event.fork.url, fullName(event.fork));
      const forked = escapeHtml(fullName(event.repo));
      return [`🍴 @${escapeHtml(event.fork.owner)} forked ${forked}: ${fork}`];
    }
  }
}

export function formatItem(item: ReportItem): string {
  switch (item.type) {
    case "tracked":
      return [
        `✨ Now tracking repository ${link(item.repo.url, fullName(item.repo))}`,
        ...quote(item.repo.description),
      ].join("\n");
    case "untracked":
      return `🚫 No longer tracking repository ${escapeHtml(fullName(item.repo))}`;
    case "renamed": {
      const current = link(item.repo.url, fullName(item.repo));
      return `✏️ Repository renamed: ${escapeHtml(fullName(item.oldRepo))} → ${current}`;
    }
    default:
      return formatEvent(item).join("\n");
  }
}

function truncate(block: string, limit: number): string {
  return block.length <= limit ? block : `${block.slice(0, limit - 1)}…`;
}

/**
 * Renders the report as Telegram HTML messages: a title line, then one block
 * per item, packed into messages no longer than `limit` characters without
 * splitting a block.
 */
export function formatReport(
  title: string,
  items: readonly ReportItem[],
  limit: number = MAX_MESSAGE_LENGTH,
): string[] {
  const blocks = [`<b>${escapeHtml(title)}</b>`, ...items.map(formatItem)].map((b) =>
    truncate(b, limit),
  );
  const messages: string[] = [];
  let current = "";
  for (const block of blocks) {
    if (current === "") {
      current = block;
    } else if (current.length + 2 + block.length <= limit) {
      current += `\n\n${block}`;
    } else {
      messages.push(current);
      current = block;
    }
  }
  if (current !== "") {
    messages.push(current);
  }
  return messages;
}
