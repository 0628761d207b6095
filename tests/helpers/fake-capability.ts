/**
 * Scriptable in-process stage capabilities for pipeline tests.
 */

import * as path from 'node:path';
import type { Entity } from '../../src/schemas/entity.js';
import type { StageName } from '../../src/schemas/stage.js';
import type {
  CapabilityContext,
  CapabilityResult,
  HealthStatus,
  SleepFn,
  StageCapability,
} from '../../src/pipeline/types.js';

/** 'ok' succeeds; an Error is thrown from execute() */
export type Behavior = 'ok' | Error;

export class FakeCapability implements StageCapability {
  readonly provider = 'fake';
  /** Entity ids passed to execute(), in call order */
  readonly calls: string[] = [];
  /** Artifacts reported by findExisting() */
  readonly existing = new Map<string, string>();
  health: HealthStatus = { ok: true, detail: 'ready' };
  /** Invoked at the start of every execute() */
  onExecute: ((entityId: string) => void) | null = null;

  private readonly scripts = new Map<string, Behavior[]>();

  constructor(readonly stage: StageName) {}

  /**
   * Queue outcomes for an entity's next calls. Once exhausted, calls succeed.
   */
  script(entityId: string, ...behaviors: Behavior[]): this {
    this.scripts.set(entityId, behaviors);
    return this;
  }

  async execute(entity: Entity, context: CapabilityContext): Promise<CapabilityResult> {
    this.calls.push(entity.id);
    this.onExecute?.(entity.id);

    const next = this.scripts.get(entity.id)?.shift();
    if (next !== undefined && next !== 'ok') {
      throw next;
    }
    return {
      artifactPath: artifactPathFor(context.dataDir, this.stage, entity.id),
      metadata: { provider: this.provider },
    };
  }

  async findExisting(entity: Entity): Promise<string | null> {
    return this.existing.get(entity.id) ?? null;
  }

  async healthCheck(): Promise<HealthStatus> {
    return this.health;
  }
}

export interface FakeCapabilities {
  music: FakeCapability;
  image: FakeCapability;
  video: FakeCapability;
}

export function createFakeCapabilities(): FakeCapabilities {
  return {
    music: new FakeCapability('music'),
    image: new FakeCapability('image'),
    video: new FakeCapability('video'),
  };
}

export function artifactPathFor(dataDir: string, stage: StageName, entityId: string): string {
  return path.join(dataDir, 'artifacts', stage, `${entityId}.out`);
}

/**
 * Sleep that returns immediately and records requested delays.
 */
export function recordingSleep(): { delays: number[]; sleep: SleepFn } {
  const delays: number[] = [];
  const sleep: SleepFn = async (ms) => {
    delays.push(ms);
  };
  return { delays, sleep };
}
