export type ModelSelection = {
  model: string;
  source: "default" | "env" | "config";
  lane: string;
};

type SelectModelArgs = {
  appEnv?: string;
  nodeEnv?: string;
  // OPENAI_MODEL, when set
  configuredModel?: string;
  env?: NodeJS.ProcessEnv;
};

const DEFAULTS_BY_LANE: Record<string, string> = {
  local: "gpt-4o-mini",
  staging: "gpt-4o-mini",
  prod: "gpt-4o",
};

function resolveLane(appEnv: string | undefined, nodeEnv: string | undefined): string {
  if (appEnv) return appEnv;
  if (nodeEnv === "production") return "prod";
  return "local";
}

/**
 * Model precedence: OPENAI_MODEL, then OPENAI_MODEL_DEFAULT, then the lane
 * override (OPENAI_MODEL_LOCAL / _STAGING / _PROD), then the lane default.
 */
export function selectModel(args: SelectModelArgs = {}): ModelSelection {
  const env = args.env ?? process.env;
  const lane = resolveLane(args.appEnv ?? env.APP_ENV, args.nodeEnv ?? env.NODE_ENV);

  if (args.configuredModel) {
    return { model: args.configuredModel, source: "config", lane };
  }

  const laneOverrides: Record<string, string | undefined> = {
    local: env.OPENAI_MODEL_LOCAL,
    staging: env.OPENAI_MODEL_STAGING,
    prod: env.OPENAI_MODEL_PROD,
  };
  const envModel = env.OPENAI_MODEL_DEFAULT || laneOverrides[lane];
  if (envModel) {
    return { model: envModel, source: "env", lane };
  }

  return { model: DEFAULTS_BY_LANE[lane] ?? DEFAULTS_BY_LANE.local ?? "gpt-4o-mini", source: "default", lane };
}
