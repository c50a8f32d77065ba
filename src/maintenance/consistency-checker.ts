/**
 * Consistency Checker
 *
 * Decides whether samples of an old sensor can be re-pointed to a new one
 * without interleaving the two histories. Only the newest sample of the old
 * sensor and the oldest sample of the new sensor are compared, so data the
 * old sensor recorded after the new one started is not detected.
 */

import type { StatisticsRepository } from '../repositories';
import type { Logger } from '../logging/logger';
import { ViolationReason } from '../types';
import type { ConsistencyResult } from '../types';

/**
 * The two sensors of a proposed reassignment
 */
export interface OrderingCheckInput {
  oldId: number;
  oldName: string;
  newId: number;
  newName: string;
}

export class ConsistencyChecker {
  constructor(
    private readonly statistics: StatisticsRepository,
    private readonly logger: Logger
  ) {}

  /**
   * Check that the old sensor's history ends strictly before the new one starts
   */
  checkOrdering(input: OrderingCheckInput): ConsistencyResult {
    const { oldId, oldName, newId, newName } = input;

    if (oldId === newId) {
      return this.violation(
        ViolationReason.SAME_ID,
        `Old and new sensor have the same id ${oldId}`,
        { oldId, newId }
      );
    }

    const oldLatest = this.statistics.findLatest(oldId);
    if (!oldLatest) {
      return this.violation(
        ViolationReason.NO_SAMPLES,
        `Old sensor ${oldName} has no statistics`,
        { oldId, oldName }
      );
    }

    const newEarliest = this.statistics.findEarliest(newId);
    if (!newEarliest) {
      return this.violation(
        ViolationReason.NO_SAMPLES,
        `New sensor ${newName} has no statistics`,
        { newId, newName }
      );
    }

    const context = {
      oldName,
      newName,
      oldCreatedTs: oldLatest.createdTs,
      newCreatedTs: newEarliest.createdTs,
      oldStartTs: oldLatest.startTs,
      newStartTs: newEarliest.startTs,
    };

    if (newEarliest.createdTs < oldLatest.createdTs) {
      return this.violation(
        ViolationReason.CREATED_OLDER,
        `First created_ts timestamp ${newEarliest.createdTs} of the new sensor ${newName} is older than ` +
          `the last timestamp ${oldLatest.createdTs} of the old sensor ${oldName}`,
        context
      );
    }
    if (newEarliest.createdTs === oldLatest.createdTs) {
      return this.violation(
        ViolationReason.CREATED_EQUAL,
        `First created_ts timestamp ${newEarliest.createdTs} of the new sensor ${newName} is equal to ` +
          `the last timestamp ${oldLatest.createdTs} of the old sensor ${oldName}`,
        context
      );
    }
    if (newEarliest.startTs < oldLatest.startTs) {
      return this.violation(
        ViolationReason.START_OLDER,
        `First start_ts timestamp ${newEarliest.startTs} of the new sensor ${newName} is older than ` +
          `the last timestamp ${oldLatest.startTs} of the old sensor ${oldName}`,
        context
      );
    }
    if (newEarliest.startTs === oldLatest.startTs) {
      return this.violation(
        ViolationReason.START_EQUAL,
        `First start_ts timestamp ${newEarliest.startTs} of the new sensor ${newName} is equal to ` +
          `the last timestamp ${oldLatest.startTs} of the old sensor ${oldName}`,
        context
      );
    }

    this.logger.info(context, 'Consistency checks passed');
    return { ok: true };
  }

  private violation(
    reason: ViolationReason,
    message: string,
    context: Record<string, string | number>
  ): ConsistencyResult {
    this.logger.error({ ...context, reason }, message);
    return { ok: false, reason, message };
  }
}
