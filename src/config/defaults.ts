import type { MusweepConfig } from "./types.js";

export const DEFAULT_CONFIG_PATH = "musweep.config.json";
export const DEFAULT_MODEL = "gpt-4o";
export const DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_API_KEY_ENV = "OPENAI_API_KEY";

export const FEATURE_WHITELIST = [
  "flow_bytes",
  "packets",
  "rate",
  "iat",
  "src_ip",
  "dst_ip",
  "src_port",
  "dst_port",
  "protocol",
  "entropy",
  "payload_len"
];

export const createDefaultConfig = (): MusweepConfig => ({
  inference: {
    model: DEFAULT_MODEL,
    base_url: DEFAULT_BASE_URL,
    api_key_env: DEFAULT_API_KEY_ENV,
    request_timeout_ms: 60_000,
    max_retries: 3,
    backoff_ms: 500,
    max_backoff_ms: 30_000,
    requests_per_second: 10
  },
  grid: {
    alpha: [0.4, 0.8, 1.2],
    beta: [0.2, 0.4, 0.6, 0.8],
    k: [3, 6],
    tau: [0.3, 0.5, 0.7],
    seed: [1, 2, 3, 4, 5],
    adversarial: [false, true],
    shuffle_seed: null
  },
  influence: {
    t0: 0.7,
    baseline_mu: 0
  },
  feedback: {
    prior: 0,
    approve_score: 0.9,
    revise_score: 0.3,
    adversarial_critic_score: 0.1,
    adversarial_producer_score: 0.4,
    seed_scores: {
      cooperative: [
        { to: "planner", from: "critic", score: 0.9 },
        { to: "researcher", from: "critic", score: 0.7 },
        { to: "planner", from: "researcher", score: 0.8 },
        { to: "researcher", from: "planner", score: 0.85 },
        { to: "critic", from: "planner", score: 0.8 },
        { to: "critic", from: "researcher", score: 0.75 }
      ],
      adversarial: [
        { to: "planner", from: "critic", score: 0.1 },
        { to: "researcher", from: "critic", score: 0.1 },
        { to: "planner", from: "researcher", score: 0.8 },
        { to: "researcher", from: "planner", score: 0.85 },
        { to: "critic", from: "planner", score: 0.4 },
        { to: "critic", from: "researcher", score: 0.4 }
      ]
    }
  },
  conversation: {
    max_rounds: 3,
    agreement_threshold: 1,
    stop_on_approve: true
  },
  protocol: {
    feature_whitelist: [...FEATURE_WHITELIST],
    required_keys: {
      planner: ["features", "steps"],
      researcher: ["features"],
      critic: ["decision"]
    },
    enforce_feature_whitelist: false
  },
  execution: {
    workers: 4,
    time_budget_s: null,
    retry_failed: false
  },
  output: {
    ledger_path: "results.csv",
    transcripts_path: null,
    log_path: null
  }
});
