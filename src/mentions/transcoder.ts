/**
 * Conversion between Discord mention markup and human-readable mentions.
 *
 * `humanize` turns `<@id>` / `<@!id>` into `@username` so message history is
 * readable by LLMs. `encode` turns `@username` and bare user IDs into `<@id>`
 * so outgoing messages actually notify the people they name.
 *
 * Both operations always produce text: a span that cannot be resolved keeps a
 * fallback form and the rest of the message is still converted.
 */

import type { GuildInfo, PlatformGateway, UserInfo } from '../types/gateway.js';
import type { Resolver } from '../resolver/resolver.js';
import { isIdentifier } from '../resolver/target.js';

/** `<@id>` and the legacy nickname form `<@!id>`. */
const USER_MENTION_PATTERN = /<@!?(\d+)>/g;

/** `@name` typed by a human. Not part of existing markup or an email address. */
const SIGIL_MENTION_PATTERN = /(?<![<\w])@([A-Za-z0-9_.]+)/g;

/** A bare 17–20 digit ID standing on its own. */
const RAW_ID_PATTERN = /(?<![<@\w])(\d{17,20})(?![>\w])/g;

/** A located piece of a message and the text that replaces it. */
export interface MentionSpan {
  start: number;
  end: number;
  text: string;
  replacement: string;
}

/**
 * Finds all matches of a global pattern, left to right.
 */
function scan(pattern: RegExp, text: string): RegExpExecArray[] {
  const regex = new RegExp(pattern.source, pattern.flags);
  const matches: RegExpExecArray[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    matches.push(match);
  }
  return matches;
}

/**
 * Rebuilds text with each span swapped for its replacement.
 * Spans must be sorted and non-overlapping.
 */
export function applySpans(text: string, spans: MentionSpan[]): string {
  const parts: string[] = [];
  let lastEnd = 0;
  for (const span of spans) {
    parts.push(text.slice(lastEnd, span.start), span.replacement);
    lastEnd = span.end;
  }
  parts.push(text.slice(lastEnd));
  return parts.join('');
}

export class MentionTranscoder {
  constructor(
    private readonly gateway: PlatformGateway,
    private readonly resolver: Resolver
  ) {}

  /**
   * Converts `<@id>` mentions to `@username`, or `@[id]` when the user
   * cannot be fetched.
   */
  async humanize(text: string): Promise<string> {
    const matches = scan(USER_MENTION_PATTERN, text);
    if (matches.length === 0) {
      return text;
    }

    const users = await this.fetchUsers(matches.map(match => match[1]));
    const spans = matches.map(match => {
      const user = users.get(match[1]);
      return {
        start: match.index,
        end: match.index + match[0].length,
        text: match[0],
        replacement: user ? `@${user.username}` : `@[${match[1]}]`,
      };
    });
    return applySpans(text, spans);
  }

  /**
   * Converts `@username`, `@id` and bare user IDs to `<@id>`.
   * Anything that does not resolve to a user is left exactly as written.
   */
  async encode(text: string, scope?: GuildInfo): Promise<string> {
    const withSigils = await this.encodeSigilMentions(text, scope);
    return this.encodeRawIds(withSigils);
  }

  private async encodeSigilMentions(text: string, scope?: GuildInfo): Promise<string> {
    const matches = scan(SIGIL_MENTION_PATTERN, text);
    if (matches.length === 0) {
      return text;
    }

    const resolved = await Promise.all(matches.map(async (match): Promise<MentionSpan | null> => {
      // "@alice." at the end of a sentence mentions alice
      const name = match[1].replace(/\.+$/, '');
      const trailing = match[1].slice(name.length);
      if (name.length === 0) {
        return null;
      }

      let id: string;
      if (isIdentifier(name)) {
        id = name;
      } else {
        const user = await this.resolveName(name, scope);
        if (!user) {
          return null;
        }
        id = user.id;
      }

      return {
        start: match.index,
        end: match.index + match[0].length,
        text: match[0],
        replacement: `<@${id}>${trailing}`,
      };
    }));

    return applySpans(text, resolved.filter((span): span is MentionSpan => span !== null));
  }

  private async encodeRawIds(text: string): Promise<string> {
    const matches = scan(RAW_ID_PATTERN, text);
    if (matches.length === 0) {
      return text;
    }

    const users = await this.fetchUsers(matches.map(match => match[1]));
    const spans: MentionSpan[] = [];
    for (const match of matches) {
      if (users.has(match[1])) {
        spans.push({
          start: match.index,
          end: match.index + match[0].length,
          text: match[0],
          replacement: `<@${match[1]}>`,
        });
      }
    }
    return applySpans(text, spans);
  }

  /**
   * Fetches each distinct ID once, concurrently. IDs that fail to fetch
   * are absent from the returned map.
   */
  private async fetchUsers(ids: string[]): Promise<Map<string, UserInfo>> {
    const distinct = [...new Set(ids)];
    const fetched = await Promise.all(distinct.map(id => this.fetchUser(id)));
    const users = new Map<string, UserInfo>();
    for (const user of fetched) {
      if (user) {
        users.set(user.id, user);
      }
    }
    return users;
  }

  private async resolveName(name: string, scope?: GuildInfo): Promise<UserInfo | undefined> {
    try {
      const result = await this.resolver.resolveUser(name, scope);
      return result.ok ? result.value : undefined;
    } catch (error) {
      console.error(`[mentions] Could not resolve @${name}: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }

  private async fetchUser(id: string): Promise<UserInfo | undefined> {
    try {
      const result = await this.gateway.fetchUser(id);
      return result.ok ? result.value : undefined;
    } catch (error) {
      console.error(`[mentions] Could not fetch user ${id}: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }
}
