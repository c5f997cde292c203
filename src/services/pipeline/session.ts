/**
 * Per-run state. Every run owns one session; nothing about a run lives in
 * module scope, so several documents can be processed at once.
 */

import { randomUUID } from 'node:crypto';
import type { PipelineConfig } from '../../config/pipeline';
import type { Document } from '../../types/learningPlan';
import { logger } from '../../utils/logger';
import type { UnitProgress } from '../topics/topic.orchestrator';
import { type PlanStage, getStageLabel } from './stages';

export interface PipelineProgress {
  sessionId: string;
  stage: PlanStage;
  statusHint: string;
  completedUnits?: number;
  totalUnits?: number;
  timestamp: string;
}

export interface SessionStats {
  units: number;
  completedUnits: number;
  candidates: number;
  topics: number;
  failedUnits: number[];
  malformedUnits: number[];
  skippedUnits: number[];
}

export interface SessionOptions {
  signal?: AbortSignal;
  onProgress?: (progress: PipelineProgress) => void;
}

export class PipelineSession {
  readonly id = randomUUID();
  readonly startedAt = Date.now();
  stage: PlanStage | null = null;
  readonly stats: SessionStats = {
    units: 0,
    completedUnits: 0,
    candidates: 0,
    topics: 0,
    failedUnits: [],
    malformedUnits: [],
    skippedUnits: [],
  };

  constructor(
    readonly document: Document,
    readonly config: PipelineConfig,
    private options: SessionOptions = {},
  ) {}

  get signal(): AbortSignal | undefined {
    return this.options.signal;
  }

  get cancelled(): boolean {
    return Boolean(this.options.signal?.aborted);
  }

  get elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  enterStage(stage: PlanStage): void {
    this.stage = stage;
    logger.info(
      { sessionId: this.id, title: this.document.metadata.title },
      getStageLabel(stage, true),
    );
    this.emit();
  }

  reportUnit(progress: UnitProgress): void {
    this.stats.completedUnits = progress.completed;
    this.emit(progress.status === 'ok' ? undefined : `Unit ${progress.unitIndex + 1} ${progress.status}`);
  }

  private emit(statusHint?: string): void {
    if (!this.options.onProgress || this.stage === null) return;
    this.options.onProgress({
      sessionId: this.id,
      stage: this.stage,
      statusHint: statusHint || getStageLabel(this.stage),
      completedUnits: this.stage === 2 ? this.stats.completedUnits : undefined,
      totalUnits: this.stage === 2 ? this.stats.units : undefined,
      timestamp: new Date().toISOString(),
    });
  }
}
