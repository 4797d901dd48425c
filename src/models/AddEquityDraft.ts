/**
 * Ticker half of the add-equity form
 *
 * editing → pending (lookup in flight) → resolved
 * A failed lookup goes back to editing with the error recorded
 */
export type TickerStep =
  | { status: 'editing'; input: string; error: string | null }
  | { status: 'pending'; ticker: string }
  | { status: 'resolved'; ticker: string; companyName: string };

/**
 * Share count half of the add-equity form
 */
export type ShareCountStep =
  | { status: 'editing'; input: string; error: string | null }
  | { status: 'submitted'; shareCount: number };

export type DraftPhase = 'editing' | 'pendingLookup' | 'readyToAdd';

/**
 * Server-side state of one open add-equity form
 */
export interface AddEquityDraft {
  id: string;
  portfolioId: number;
  ticker: TickerStep;
  shareCount: ShareCountStep;
  createdAt: string;
  updatedAt: string;
  expiresAt: string;
}

/**
 * Draft whose ticker lookup is in flight
 */
export interface PendingTickerDraft extends AddEquityDraft {
  ticker: Extract<TickerStep, { status: 'pending' }>;
}

/**
 * Draft that can be committed
 */
export interface ReadyDraft extends AddEquityDraft {
  ticker: Extract<TickerStep, { status: 'resolved' }>;
  shareCount: Extract<ShareCountStep, { status: 'submitted' }>;
}

/**
 * Draft as returned by the API, with its derived phase
 */
export interface AddEquityDraftView extends AddEquityDraft {
  phase: DraftPhase;
}
