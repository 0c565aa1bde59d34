import { logger, loggerPrefix } from '../application-logger';
import {
  hasOptimalRewardOracle,
  IClickModelEnvironment,
} from '../environment/click-model-environment';
import { InvalidRoundCountError } from '../errors';
import { IRankingPolicy } from '../policy/ranking-policy';
import { Interaction } from '../types';

import { SimulationLog } from './simulation-log';

export type SimulatorState = 'idle' | 'running' | 'completed';

/**
 * Drives a ranking policy against a click-model environment, one round at a time.
 */
export class BanditSimulator {
  private currentState: SimulatorState = 'idle';

  constructor(
    private readonly environment: IClickModelEnvironment,
    private readonly policy: IRankingPolicy,
  ) {}

  get state(): SimulatorState {
    return this.currentState;
  }

  run(rounds: number): SimulationLog {
    if (!Number.isInteger(rounds) || rounds < 1) {
      throw new InvalidRoundCountError(rounds);
    }

    this.currentState = 'running';
    logger.debug(
      `${loggerPrefix} Running ${this.policy.name} against ${this.environment.model} for ${rounds} rounds`,
    );

    const history: Interaction[] = [];
    try {
      for (let round = 0; round < rounds; round++) {
        const slate = this.policy.selectSlate();
        const interaction = this.environment.evaluate(slate);
        this.policy.update(interaction);
        history.push(interaction);
      }
    } catch (error) {
      this.currentState = 'idle';
      logger.error(
        { err: error, round: history.length + 1 },
        `${loggerPrefix} Simulation aborted`,
      );
      throw error;
    }

    const log = new SimulationLog(history, this.computeOptimalReward());
    this.currentState = 'completed';
    logger.debug(
      { rounds: log.rounds, totalReward: log.totalReward, optimalReward: log.optimalReward },
      `${loggerPrefix} Simulation completed`,
    );
    return log;
  }

  private computeOptimalReward(): number | null {
    const { environment } = this;
    if (!hasOptimalRewardOracle(environment)) {
      return null;
    }
    try {
      return environment.expectedReward(environment.optimalSlate());
    } catch (error) {
      logger.warn({ err: error }, `${loggerPrefix} Optimal reward unavailable; regret will be omitted`);
      return null;
    }
  }
}
