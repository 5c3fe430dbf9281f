import type { Role } from "../core/types.js";

export type SeedFeedbackEntry = {
  to: Role;
  from: Role;
  score: number;
};

/**
 * Shape of a config file on disk. Every section is optional and merged over
 * the defaults before validation.
 */
export type MusweepConfigInput = {
  inference?: Partial<InferenceConfig>;
  grid?: Partial<GridConfig>;
  influence?: Partial<InfluenceConfig>;
  feedback?: Partial<FeedbackConfig>;
  conversation?: Partial<ConversationConfig>;
  protocol?: Partial<ProtocolConfig>;
  execution?: Partial<ExecutionConfig>;
  output?: Partial<OutputConfig>;
};

export type InferenceConfig = {
  model: string;
  base_url: string;
  api_key_env: string;
  request_timeout_ms: number;
  max_retries: number;
  backoff_ms: number;
  max_backoff_ms: number;
  requests_per_second: number | null;
};

export type GridConfig = {
  alpha: number[];
  beta: number[];
  k: number[];
  tau: number[];
  seed: number[];
  adversarial: boolean[];
  shuffle_seed: number | null;
};

export type InfluenceConfig = {
  t0: number;
  baseline_mu: number;
};

export type FeedbackConfig = {
  prior: number | null;
  approve_score: number;
  revise_score: number;
  adversarial_critic_score: number;
  adversarial_producer_score: number;
  seed_scores: {
    cooperative: SeedFeedbackEntry[];
    adversarial: SeedFeedbackEntry[];
  };
};

export type ConversationConfig = {
  max_rounds: number;
  agreement_threshold: number;
  stop_on_approve: boolean;
};

export type ProtocolConfig = {
  feature_whitelist: string[];
  required_keys: Record<Role, string[]>;
  enforce_feature_whitelist: boolean;
};

export type ExecutionConfig = {
  workers: number;
  time_budget_s: number | null;
  retry_failed: boolean;
};

export type OutputConfig = {
  ledger_path: string;
  transcripts_path: string | null;
  log_path: string | null;
};

export type MusweepConfig = {
  inference: InferenceConfig;
  grid: GridConfig;
  influence: InfluenceConfig;
  feedback: FeedbackConfig;
  conversation: ConversationConfig;
  protocol: ProtocolConfig;
  execution: ExecutionConfig;
  output: OutputConfig;
};

type DeepReadonly<T> = T extends (infer Item)[]
  ? ReadonlyArray<DeepReadonly<Item>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type ResolvedConfig = DeepReadonly<MusweepConfig>;
