/**
 * Shared fixtures for marathon tests: temp data directories, a reply sink that records
 * what would have been sent, a controllable clock and a quiet logger.
 */
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import type { MarathonCaller, MarathonInvocation, MarathonReply } from "@/modules/marathon";
import type { ScopedLogger } from "@/utils/logger";

export async function makeDataDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "marathon-test-"));
}

export async function removeDataDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface RecordingSink {
  replies: MarathonReply[];
  send(reply: MarathonReply): Promise<void>;
}

export function recordingSink(): RecordingSink {
  const replies: MarathonReply[] = [];
  return {
    replies,
    async send(reply) {
      replies.push(reply);
    },
  };
}

/** An invocation plus the sink it replies through. */
export function invoke(caller: Partial<MarathonCaller> & { userId: string }): MarathonInvocation & { sink: RecordingSink } {
  const sink = recordingSink();
  return {
    caller: { channelId: "c1", roleIds: [], ...caller },
    reply: sink,
    sink,
  };
}

export function lastReply(sink: RecordingSink): MarathonReply | undefined {
  return sink.replies[sink.replies.length - 1];
}

export class TestClock {
  constructor(private current: Date) {}

  now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function quietLogger(): ScopedLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export const PUZZLES_YAML = `p1:
  name: Warmup
  category: intro
  points: 1
  url: https://example.com/p1
p2:
  name: Crossword
  category: words
  points: 3
  url: https://example.com/p2
`;

export const TEAMS_YAML = `alpha:
  members: [u1]
  channels: [c1]
`;

export const TWO_TEAMS_YAML = `alpha:
  members: [u1]
  channels: [c1]
beta:
`;
