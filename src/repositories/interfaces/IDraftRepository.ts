import { AddEquityDraft } from '@/models';

/**
 * Draft Repository Interface
 * Open add-equity forms; expired drafts behave as missing
 */
export interface IDraftRepository {
  save(draft: AddEquityDraft): Promise<AddEquityDraft>;

  /**
   * @returns The draft, or null if unknown or past expiresAt
   */
  findById(draftId: string): Promise<AddEquityDraft | null>;

  /**
   * Read-modify-write of the current draft in one step
   * A transition that throws leaves the draft unchanged.
   * @returns The stored draft, or null if unknown or past expiresAt
   */
  update<T extends AddEquityDraft>(
    draftId: string,
    transition: (draft: AddEquityDraft) => T
  ): Promise<T | null>;

  /**
   * Remove and return the draft in one step; only one caller gets it
   * @returns null if unknown or past expiresAt
   */
  take(draftId: string): Promise<AddEquityDraft | null>;

  /**
   * @returns false if the draft was unknown or past expiresAt
   */
  delete(draftId: string): Promise<boolean>;
}
