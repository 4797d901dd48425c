import { AddEquityDraft } from '@/models';
import { IDraftRepository } from '../interfaces/IDraftRepository';

/**
 * Draft Repository (in-memory)
 *
 * Used with every storage driver: drafts are short-lived form state.
 * Expired drafts are dropped when looked up or when another draft is saved.
 * No method awaits between reading and writing a draft.
 */
export class MemoryDraftRepository implements IDraftRepository {
  private drafts = new Map<string, AddEquityDraft>();

  constructor(private now: () => Date = () => new Date()) {}

  async save(draft: AddEquityDraft): Promise<AddEquityDraft> {
    this.pruneExpired();
    this.drafts.set(draft.id, structuredClone(draft));
    return structuredClone(draft);
  }

  async findById(draftId: string): Promise<AddEquityDraft | null> {
    const draft = this.live(draftId);
    return draft ? structuredClone(draft) : null;
  }

  async update<T extends AddEquityDraft>(
    draftId: string,
    transition: (draft: AddEquityDraft) => T
  ): Promise<T | null> {
    const current = this.live(draftId);
    if (!current) {
      return null;
    }

    const next = transition(structuredClone(current));
    this.drafts.set(draftId, structuredClone(next));
    return structuredClone(next);
  }

  async take(draftId: string): Promise<AddEquityDraft | null> {
    const draft = this.live(draftId);
    if (!draft) {
      return null;
    }

    this.drafts.delete(draftId);
    return draft;
  }

  async delete(draftId: string): Promise<boolean> {
    return this.live(draftId) !== null && this.drafts.delete(draftId);
  }

  /**
   * The stored draft, dropping it first if it has expired
   */
  private live(draftId: string): AddEquityDraft | null {
    const draft = this.drafts.get(draftId);
    if (!draft) {
      return null;
    }

    if (this.isExpired(draft)) {
      this.drafts.delete(draftId);
      return null;
    }

    return draft;
  }

  private pruneExpired(): void {
    for (const [id, draft] of this.drafts) {
      if (this.isExpired(draft)) {
        this.drafts.delete(id);
      }
    }
  }

  private isExpired(draft: AddEquityDraft): boolean {
    return Date.parse(draft.expiresAt) <= this.now().getTime();
  }
}
