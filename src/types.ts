export interface MotionSample {
  ts: number;
  isMotion: boolean;
}

export interface SnapshotRef {
  path: string | null;
  fileName: string;
  contentType: string;
  data: Buffer;
}

export interface MotionEvent {
  timestamp: Date;
  message: string;
  snapshot: SnapshotRef | null;
}

export type ChannelOutcomeStatus = 'delivered' | 'failed' | 'skipped';

export type ChannelOutcome =
  | { status: 'delivered'; channel: string; statusCode: number | null; durationMs: number }
  | {
      status: 'failed';
      channel: string;
      reason: string;
      statusCode?: number;
      durationMs: number;
    }
  | { status: 'skipped'; channel: string; reason: 'disabled' };

export interface Channel {
  readonly name: string;
  readonly enabled: boolean;
  send(message: string, snapshot?: SnapshotRef | null): Promise<ChannelOutcome>;
}

export interface DispatchReport {
  timestamp: Date;
  message: string;
  snapshotPath: string | null;
  outcomes: ChannelOutcome[];
  durationMs: number;
}

export interface MotionEvaluation {
  isMotion: boolean;
  areaPct: number;
  changedPixels: number;
  totalPixels: number;
  minAreaPixels: number;
}

export interface MotionSignal {
  evaluate(frame: Buffer): MotionEvaluation;
}

export interface SnapshotStore {
  persist(frame: Buffer, at: Date): Promise<SnapshotRef>;
}
