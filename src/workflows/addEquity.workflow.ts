import {
  AddEquityDraft,
  AddEquityDraftView,
  DirectoryEntry,
  DraftPhase,
  NewEquity,
  PendingTickerDraft,
  ReadyDraft,
} from '@/models';
import { BusinessRuleError } from '@/errors';
import { parseOrThrow, shareCountSchema, tickerSchema } from '@/validators/equity.validator';

/**
 * Add-Equity Workflow
 *
 * Pure transitions over an AddEquityDraft. Every function returns a new
 * draft and never touches storage or the directory; AddEquityWorkflowService
 * drives the lookup in between submitTicker and resolveTicker/rejectTicker.
 *
 *   ticker:      editing ──submitTicker──▶ pending ──resolveTicker──▶ resolved
 *                   ▲                         │
 *                   └──────rejectTicker───────┘
 *   share count: editing ──submitShareCount──▶ submitted
 *
 * readyToAdd = ticker resolved AND share count submitted.
 */

export function createDraft(
  id: string,
  portfolioId: number,
  now: Date,
  ttlSeconds: number
): AddEquityDraft {
  const timestamp = now.toISOString();

  return {
    id,
    portfolioId,
    ticker: { status: 'editing', input: '', error: null },
    shareCount: { status: 'editing', input: '', error: null },
    createdAt: timestamp,
    updatedAt: timestamp,
    expiresAt: new Date(now.getTime() + ttlSeconds * 1000).toISOString(),
  };
}

/**
 * Bump updatedAt and slide the expiry window
 */
export function touch<T extends AddEquityDraft>(draft: T, now: Date, ttlSeconds: number): T {
  return {
    ...draft,
    updatedAt: now.toISOString(),
    expiresAt: new Date(now.getTime() + ttlSeconds * 1000).toISOString(),
  };
}

/**
 * Move the ticker step to pending
 * Throws ValidationError on malformed input and leaves the draft as it was.
 * Allowed from any ticker status: resubmitting starts the step over.
 */
export function submitTicker(draft: AddEquityDraft, rawTicker: unknown): PendingTickerDraft {
  const ticker = parseOrThrow(tickerSchema, rawTicker);

  return { ...draft, ticker: { status: 'pending', ticker } };
}

export function resolveTicker(draft: AddEquityDraft, entry: DirectoryEntry): AddEquityDraft {
  if (draft.ticker.status !== 'pending' || draft.ticker.ticker !== entry.ticker) {
    throw new BusinessRuleError(`No lookup pending for ticker ${entry.ticker}`);
  }

  return {
    ...draft,
    ticker: { status: 'resolved', ticker: entry.ticker, companyName: entry.companyName },
  };
}

/**
 * True while the lookup for this ticker is still the one the draft waits on
 * A resubmitted ticker supersedes the earlier lookup.
 */
export function isAwaitingLookup(draft: AddEquityDraft, ticker: string): boolean {
  return draft.ticker.status === 'pending' && draft.ticker.ticker === ticker;
}

/**
 * Lookup failed: back to editing, keeping what was typed
 */
export function rejectTicker(draft: AddEquityDraft, reason: string): AddEquityDraft {
  if (draft.ticker.status !== 'pending') {
    throw new BusinessRuleError('No ticker lookup is pending');
  }

  return {
    ...draft,
    ticker: { status: 'editing', input: draft.ticker.ticker, error: reason },
  };
}

export function submitShareCount(draft: AddEquityDraft, rawShareCount: unknown): AddEquityDraft {
  const shareCount = parseOrThrow(shareCountSchema, rawShareCount);

  return { ...draft, shareCount: { status: 'submitted', shareCount } };
}

export function isReadyToAdd(draft: AddEquityDraft): draft is ReadyDraft {
  return draft.ticker.status === 'resolved' && draft.shareCount.status === 'submitted';
}

export function getPhase(draft: AddEquityDraft): DraftPhase {
  if (isReadyToAdd(draft)) return 'readyToAdd';
  if (draft.ticker.status === 'pending') return 'pendingLookup';
  return 'editing';
}

/**
 * The equity a ready draft commits, or a BusinessRuleError naming what is missing
 */
export function toNewEquity(draft: AddEquityDraft): NewEquity {
  if (!isReadyToAdd(draft)) {
    const missing: string[] = [];
    if (draft.ticker.status !== 'resolved') missing.push('ticker is not resolved');
    if (draft.shareCount.status !== 'submitted') missing.push('share count is not submitted');

    throw new BusinessRuleError(`Draft is not ready to add: ${missing.join(' and ')}`);
  }

  return {
    ticker: draft.ticker.ticker,
    companyName: draft.ticker.companyName,
    shareCount: draft.shareCount.shareCount,
  };
}

export function toDraftView(draft: AddEquityDraft): AddEquityDraftView {
  return { ...draft, phase: getPhase(draft) };
}
