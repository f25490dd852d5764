export type FrameMime = 'image/jpeg' | 'image/png';

export type Frame = Readonly<{
  seq: number;
  ts_ms: number;
  data: Buffer;
  mime: FrameMime;
}>;

export type IncomingFrame = Readonly<{
  ts_ms?: number;
  data: Buffer;
  mime: FrameMime;
}>;

export type Overlay = Readonly<{
  text: string;
  status: 'Processing...' | 'Ready';
  lines: readonly string[];
}>;

export type ForwardedFrame = Frame & Readonly<{ overlay: Overlay }>;

/** Receives every frame in arrival order. The relay awaits it before `submit` resolves. */
export type OutputSink = (frame: ForwardedFrame) => void | Promise<void>;

export type RelaySettings = Readonly<{
  process_every_n_frames: number;
  prompt: string;
  model: string;
  max_tokens: number;
}>;

export type InferenceRequest = Readonly<{
  id: number;
  frame: Frame;
  prompt: string;
  model: string;
  max_tokens: number;
  issued_at: number;
}>;

export type TokenUsage = {
  prompt_tokens: number | null;
  completion_tokens: number | null;
  total_tokens: number | null;
};

export type InferenceErrorKind =
  | 'timeout'
  | 'http'
  | 'network'
  | 'invalid_response'
  | 'unavailable'
  | 'unknown';

type ResultBase = {
  request_id: number;
  frame_seq: number;
  model: string;
  prompt: string;
  issued_at: number;
  completed_at: number;
  latency_ms: number;
};

export type InferenceResult = Readonly<
  | (ResultBase & { status: 'ok'; text: string; usage: TokenUsage })
  | (ResultBase & { status: 'error'; error: { kind: InferenceErrorKind; message: string } })
>;

export type SkipReason = 'interval' | 'busy';

export type SubmitOutcome =
  | { seq: number; sampled: true; request_id: number }
  | { seq: number; sampled: false; reason: SkipReason };

export type RelayStats = {
  frames_received: number;
  frames_forwarded: number;
  inference_attempts: number;
  busy_skips: number;
  in_flight: boolean;
  consecutive_failures: number;
};
