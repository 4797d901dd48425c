import { randomUUID } from 'crypto';
import { AddEquityDraft, AddEquityDraftView, AddEquityResult, DirectoryEntry } from '@/models';
import { IDraftRepository } from '@/repositories/interfaces';
import { TTL_CONFIG } from '@/config/businessRules';
import { AppError, NotFoundError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import {
  createDraft,
  isAwaitingLookup,
  rejectTicker,
  resolveTicker,
  submitShareCount,
  submitTicker,
  toDraftView,
  toNewEquity,
  touch,
} from '@/workflows/addEquity.workflow';
import { EquityDirectoryService } from './equityDirectory.service';
import { PortfolioService } from './portfolio.service';

const logger = createLogger('AddEquityWorkflow');

/**
 * Add-Equity Workflow Service
 *
 * Keeps one draft per open "Add Equity" form and runs the directory lookup
 * for submitted tickers. Transitions themselves live in addEquity.workflow.
 */
export class AddEquityWorkflowService {
  constructor(
    private draftRepo: IDraftRepository,
    private directoryService: EquityDirectoryService,
    private portfolioService: PortfolioService,
    private now: () => Date = () => new Date()
  ) {}

  async startDraft(portfolioId: number): Promise<AddEquityDraftView> {
    const draft = await this.draftRepo.save(
      createDraft(randomUUID(), portfolioId, this.now(), TTL_CONFIG.DRAFT_TTL_SECONDS)
    );

    logger.debug({ draftId: draft.id, portfolioId }, 'Add-equity draft started');
    return toDraftView(draft);
  }

  async getDraft(draftId: string): Promise<AddEquityDraftView> {
    return toDraftView(await this.requireDraft(draftId));
  }

  /**
   * Submit the ticker and resolve it
   *
   * The draft is stored as pending while the lookup runs. A failed lookup
   * puts the ticker step back to editing with the error and rethrows.
   * The outcome is applied to the draft as it is when the lookup returns,
   * and only if it still waits on this ticker.
   *
   * @throws ValidationError for malformed input (draft unchanged)
   * @throws NotFoundError for an unknown ticker
   */
  async submitTicker(draftId: string, rawTicker: unknown): Promise<AddEquityDraftView> {
    const pending = await this.updateDraft(draftId, (draft) => submitTicker(draft, rawTicker));
    const { ticker } = pending.ticker;

    let entry: DirectoryEntry;
    try {
      entry = await this.directoryService.lookupTicker(ticker);
    } catch (error) {
      const reason = error instanceof AppError ? error.message : 'Ticker lookup failed';
      await this.draftRepo.update(draftId, (draft) =>
        isAwaitingLookup(draft, ticker) ? this.stamp(rejectTicker(draft, reason)) : draft
      );
      throw error;
    }

    const resolved = await this.updateDraft(draftId, (draft) =>
      isAwaitingLookup(draft, ticker) ? resolveTicker(draft, entry) : draft
    );

    return toDraftView(resolved);
  }

  /**
   * @throws ValidationError for a non-integer, zero or negative count (draft unchanged)
   */
  async submitShareCount(draftId: string, rawShareCount: unknown): Promise<AddEquityDraftView> {
    const draft = await this.updateDraft(draftId, (current) =>
      submitShareCount(current, rawShareCount)
    );

    return toDraftView(draft);
  }

  /**
   * Append the drafted equity to its portfolio and close the draft
   *
   * The draft is taken out of the store first, so a second commit of the
   * same draft finds nothing. It is put back if the add fails.
   *
   * @throws BusinessRuleError when the draft is not readyToAdd
   */
  async commitDraft(draftId: string): Promise<AddEquityResult> {
    const draft = await this.draftRepo.take(draftId);
    if (!draft) {
      throw new NotFoundError(`Draft ${draftId} not found or expired`);
    }

    let result: AddEquityResult;
    try {
      result = await this.portfolioService.addResolvedEquity(draft.portfolioId, toNewEquity(draft));
    } catch (error) {
      await this.draftRepo.save(draft);
      throw error;
    }

    logger.info(
      { draftId, portfolioId: draft.portfolioId, ticker: result.equity.ticker },
      'Add-equity draft committed'
    );
    metrics.incrementCounter('workflow.drafts.committed');

    return result;
  }

  /**
   * Close the form without adding anything
   */
  async cancelDraft(draftId: string): Promise<void> {
    if (!(await this.draftRepo.delete(draftId))) {
      throw new NotFoundError(`Draft ${draftId} not found or expired`);
    }

    logger.debug({ draftId }, 'Add-equity draft cancelled');
    metrics.incrementCounter('workflow.drafts.cancelled');
  }

  private async requireDraft(draftId: string): Promise<AddEquityDraft> {
    const draft = await this.draftRepo.findById(draftId);

    if (!draft) {
      throw new NotFoundError(`Draft ${draftId} not found or expired`);
    }

    return draft;
  }

  /**
   * Apply a transition to the stored draft and slide its expiry
   */
  private async updateDraft<T extends AddEquityDraft>(
    draftId: string,
    transition: (draft: AddEquityDraft) => T
  ): Promise<T> {
    const updated = await this.draftRepo.update(draftId, (draft) => this.stamp(transition(draft)));

    if (!updated) {
      throw new NotFoundError(`Draft ${draftId} not found or expired`);
    }

    return updated;
  }

  private stamp<T extends AddEquityDraft>(draft: T): T {
    return touch(draft, this.now(), TTL_CONFIG.DRAFT_TTL_SECONDS);
  }
}
