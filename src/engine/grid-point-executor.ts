import type { ResolvedConfig } from "../config/types.js";
import type { Condition, Conversation, GridPoint, ResultRow, Role, Turn, TurnFailure } from "../core/types.js";
import { runConversation } from "../conversation/runner.js";
import type { InferenceService } from "../inference/service.js";
import { deriveInfluenceProfile } from "../influence/profile.js";
import { assembleResultRow, isFailedRow } from "../metrics/result-row.js";
import { gridPointKey } from "./grid.js";

export type GridPointOutcome = {
  key: string;
  point: GridPoint;
  row: ResultRow;
  failed: boolean;
  failures: TurnFailure[];
  mu: Record<Role, number>;
  conversations: Record<Condition, Conversation>;
};

export type GridPointExecutorContext = {
  config: ResolvedConfig;
  service: InferenceService;
  onTurnRepaired?: (input: { key: string; condition: Condition; turn: Turn }) => void;
};

export type GridPointExecutor = (point: GridPoint) => Promise<GridPointOutcome>;

/**
 * Baseline first, then influence; both share the point's seed. Protocol and
 * service failures end up as sentinels in the row rather than as errors.
 */
export const createGridPointExecutor = (context: GridPointExecutorContext): GridPointExecutor =>
  async (point) => {
    const key = gridPointKey(point);
    const influenceProfile = deriveInfluenceProfile(point, "influence", context.config);
    const converse = (condition: Condition): Promise<Conversation> =>
      runConversation({
        point,
        condition,
        profile:
          condition === "influence"
            ? influenceProfile
            : deriveInfluenceProfile(point, condition, context.config),
        config: context.config,
        service: context.service,
        onTurnRepaired: (turn) => context.onTurnRepaired?.({ key, condition, turn })
      });

    const baseline = await converse("baseline");
    const influence = await converse("influence");
    const { mu } = influenceProfile;

    const row = assembleResultRow({
      point,
      mu,
      baseline,
      influence,
      whitelist: context.config.protocol.feature_whitelist
    });

    return {
      key,
      point,
      row,
      failed: isFailedRow(row),
      failures: [baseline.failure, influence.failure].filter(
        (failure): failure is TurnFailure => failure !== undefined
      ),
      mu,
      conversations: { baseline, influence }
    };
  };
