// =============================================================================
// CASE EVALUATION — Format Scorers
//
// Per-item ratings under a session, one record set per format:
//
//   format_1  timeline events   keyed by eventIndex
//   format_2  tactic triples    keyed by tripleIndex
//   format_3  boundary options  keyed by optionIndex
//
// Writes are idempotent by (session, index): the last writer wins.
// A completed session accepts no further writes or deletes.
// =============================================================================

import { notFound } from '../errors';
import { IAccessPolicy } from '../types/authorization';
import {
  BoundaryRating,
  BoundaryRatingFields,
  RatingFormat,
  RatingInput,
  RatingRecord,
  TacticRating,
  TacticRatingFields,
  TimelineRating,
  TimelineRatingFields,
} from '../types/evaluation';
import { IEvaluationStore } from '../types/store';
import { requireOpen } from './sessions';
import {
  boundaryRatingSchema,
  parseInput,
  ratingIndexSchema,
  tacticRatingSchema,
  timelineRatingSchema,
} from './validation';

function toRatingInput(format: RatingFormat, fields: unknown): RatingInput {
  switch (format) {
    case 'format_1':
      return { format, ...parseInput(timelineRatingSchema, fields, 'timeline rating') };
    case 'format_2':
      return { format, ...parseInput(tacticRatingSchema, fields, 'tactic rating') };
    case 'format_3':
      return { format, ...parseInput(boundaryRatingSchema, fields, 'boundary rating') };
  }
}

export class RatingScorer {
  constructor(
    private readonly store: IEvaluationStore,
    private readonly policy: IAccessPolicy
  ) {}

  /**
   * Insert or overwrite the rating at `index`. Ownership is checked
   * through the parent session; INVALID_STATE once it is completed.
   */
  async upsertRating(
    callerId: string,
    sessionId: string,
    format: RatingFormat,
    index: unknown,
    fields: unknown
  ): Promise<RatingRecord> {
    await this.authorize(callerId, 'update', sessionId, format);
    const position = parseInput(ratingIndexSchema, index, 'rating index');
    const input = toRatingInput(format, fields);
    return requireOpen(await this.store.upsertRating(sessionId, position, input), sessionId);
  }

  async upsertTimelineRating(
    callerId: string,
    sessionId: string,
    eventIndex: number,
    fields: TimelineRatingFields
  ): Promise<TimelineRating> {
    const record = await this.upsertRating(callerId, sessionId, 'format_1', eventIndex, fields);
    if (record.format !== 'format_1') throw new Error('Store returned a rating of the wrong format');
    return record;
  }

  async upsertTacticRating(
    callerId: string,
    sessionId: string,
    tripleIndex: number,
    fields: TacticRatingFields
  ): Promise<TacticRating> {
    const record = await this.upsertRating(callerId, sessionId, 'format_2', tripleIndex, fields);
    if (record.format !== 'format_2') throw new Error('Store returned a rating of the wrong format');
    return record;
  }

  async upsertBoundaryRating(
    callerId: string,
    sessionId: string,
    optionIndex: number,
    fields: BoundaryRatingFields
  ): Promise<BoundaryRating> {
    const record = await this.upsertRating(callerId, sessionId, 'format_3', optionIndex, fields);
    if (record.format !== 'format_3') throw new Error('Store returned a rating of the wrong format');
    return record;
  }

  /** Ratings of one format for a session, ordered by index. */
  async listRatings(callerId: string, sessionId: string, format: RatingFormat): Promise<RatingRecord[]> {
    await this.authorize(callerId, 'select', sessionId, format);
    return this.store.listRatings(sessionId, format);
  }

  async deleteRating(callerId: string, sessionId: string, format: RatingFormat, index: unknown): Promise<void> {
    await this.authorize(callerId, 'delete', sessionId, format);
    const position = parseInput(ratingIndexSchema, index, 'rating index');
    const removed = requireOpen(await this.store.deleteRating(sessionId, format, position), sessionId);
    if (!removed) {
      throw notFound(`No ${format} rating at index ${position} in session ${sessionId}`);
    }
  }

  /**
   * Policy check on the rating resource. Admins asking about a session
   * that does not exist get NOT_FOUND; everyone else is denied.
   */
  private async authorize(
    callerId: string,
    action: 'select' | 'update' | 'delete',
    sessionId: string,
    format: RatingFormat
  ): Promise<void> {
    await this.policy.enforce(callerId, action, { type: 'rating', format, sessionId });
    if (action === 'select' && !(await this.store.getSession(sessionId))) {
      throw notFound(`Session ${sessionId} not found`);
    }
  }
}
