import { logger, QuotaLedger, type DiscoveryCandidate } from "@shortloop/shared";

import type { WorkerConfig } from "./config";
import { ingestCandidates, type IngestSummary } from "./discovery/ingest";
import { createRunNotifier, type RunNotifier } from "./notifications/runNotifier";
import { summarizeTracking, type TrackingReport } from "./report/status";
import { Scheduler } from "./scheduler/scheduler";
import { runCommand, type CommandRunner } from "./services/process";
import { YouTubeClient } from "./services/youtube/client";
import { listChannelVideos } from "./services/youtube/listing";
import { YtDlpFetchExecutor } from "./stages/fetch";
import { YouTubePublishExecutor } from "./stages/publish";
import { FfmpegTransformExecutor } from "./stages/transform";
import type { StageExecutors } from "./stages/types";
import { createTrackingStore } from "./tracking/createStore";
import type { TrackingStore } from "./tracking/types";

export type CandidateSource = () => Promise<DiscoveryCandidate[]>;

export interface RuntimeOverrides {
  store?: TrackingStore;
  executors?: StageExecutors;
  discover?: CandidateSource;
  runner?: CommandRunner;
  notifier?: RunNotifier;
  now?: () => Date;
}

/**
 * Wires configuration to the default collaborators. Everything can be
 * replaced through `overrides`.
 */
export class WorkerRuntime {
  readonly config: WorkerConfig;
  readonly store: TrackingStore;
  readonly notifier: RunNotifier;
  private readonly overrides: RuntimeOverrides;

  constructor(config: WorkerConfig, overrides: RuntimeOverrides = {}) {
    this.config = config;
    this.overrides = overrides;
    this.store = overrides.store ?? createTrackingStore(config.tracking);
    this.notifier = overrides.notifier ?? createRunNotifier(config.notify);
  }

  createExecutors(): StageExecutors {
    if (this.overrides.executors) {
      return this.overrides.executors;
    }

    const accessToken = this.config.publish.accessToken;
    if (!accessToken) {
      throw new Error("YOUTUBE_ACCESS_TOKEN is required to publish");
    }

    const runner = this.overrides.runner ?? runCommand;
    return {
      fetch: new YtDlpFetchExecutor({ workDir: this.config.media.workDir, runner }),
      transform: new FfmpegTransformExecutor({
        workDir: this.config.media.workDir,
        plan: this.config.media.segments,
        runner,
      }),
      publish: new YouTubePublishExecutor(new YouTubeClient({ accessToken }), {
        visibility: this.config.publish.visibility,
        tags: this.config.publish.tags,
      }),
    };
  }

  createScheduler(): Scheduler {
    return new Scheduler({
      store: this.store,
      executors: this.createExecutors(),
      config: this.config.scheduler,
      now: this.overrides.now,
    });
  }

  /**
   * Lists the source channel and records new candidates. Returns null when
   * no source is configured.
   */
  async discover(): Promise<IngestSummary | null> {
    const source = this.overrides.discover ?? this.defaultSource();
    if (!source) {
      logger.info("discovery_skipped", { service: "worker", reason: "no_source_channel" });
      return null;
    }

    const candidates = await source();
    return ingestCandidates(this.store, candidates, { now: this.overrides.now });
  }

  async status(top?: number): Promise<TrackingReport> {
    const snapshot = await this.store.load();
    const ledger = new QuotaLedger(
      {
        dailyBudget: this.config.scheduler.dailyBudget,
        timeZone: this.config.scheduler.quotaTimeZone,
        now: this.overrides.now,
      },
      snapshot.ledger,
    );
    return summarizeTracking(snapshot.items.values(), {
      top,
      corrupt: snapshot.corrupt,
      quota: ledger.currentUsage(),
    });
  }

  private defaultSource(): CandidateSource | null {
    const { channelUrl, limit } = this.config.discovery;
    if (!channelUrl) return null;
    const runner = this.overrides.runner ?? runCommand;
    return () => listChannelVideos(channelUrl, limit, runner);
  }
}
