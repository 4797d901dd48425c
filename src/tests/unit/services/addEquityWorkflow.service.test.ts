import { AddEquityWorkflowService } from '@/services/addEquityWorkflow.service';
import { EquityDirectoryService } from '@/services/equityDirectory.service';
import { PortfolioService } from '@/services/portfolio.service';
import { MemoryDraftRepository } from '@/repositories/memory/draft.repository';
import { MemoryPortfolioRepository } from '@/repositories/memory/portfolio.repository';
import { IEquityDirectoryRepository } from '@/repositories/interfaces';
import { DirectoryEntry } from '@/models';
import { BusinessRuleError, NotFoundError, ValidationError } from '@/errors';
import { MSFT_ENTRY, createMockDirectoryRepository } from '@/tests/utils/mockRepositories';

describe('AddEquityWorkflowService', () => {
  let clock: Date;
  let workflowService: AddEquityWorkflowService;
  let portfolioRepo: MemoryPortfolioRepository;
  let mockDirectoryRepo: jest.Mocked<IEquityDirectoryRepository>;

  const now = () => clock;
  const flush = () => new Promise((resolve) => setImmediate(resolve));

  function deferLookup(): (entry: DirectoryEntry | null) => void {
    let finish: (entry: DirectoryEntry | null) => void = () => undefined;
    mockDirectoryRepo.findByTicker.mockImplementationOnce(
      () =>
        new Promise<DirectoryEntry | null>((resolve) => {
          finish = resolve;
        })
    );
    return (entry) => finish(entry);
  }

  beforeEach(() => {
    clock = new Date('2024-03-01T14:30:00.000Z');
    mockDirectoryRepo = createMockDirectoryRepository();
    mockDirectoryRepo.findByTicker.mockImplementation(async (ticker) =>
      ticker === 'MSFT' ? MSFT_ENTRY : null
    );
    portfolioRepo = new MemoryPortfolioRepository(now);

    const directoryService = new EquityDirectoryService(mockDirectoryRepo);
    workflowService = new AddEquityWorkflowService(
      new MemoryDraftRepository(now),
      directoryService,
      new PortfolioService(portfolioRepo, directoryService),
      now
    );
  });

  describe('startDraft', () => {
    it('should open a draft with both steps editing and empty input', async () => {
      const draft = await workflowService.startDraft(4);

      expect(draft).toEqual({
        id: expect.any(String),
        portfolioId: 4,
        phase: 'editing',
        ticker: { status: 'editing', input: '', error: null },
        shareCount: { status: 'editing', input: '', error: null },
        createdAt: '2024-03-01T14:30:00.000Z',
        updatedAt: '2024-03-01T14:30:00.000Z',
        expiresAt: '2024-03-01T15:00:00.000Z',
      });
    });
  });

  describe('submitTicker', () => {
    it('should resolve a known ticker', async () => {
      const { id } = await workflowService.startDraft(1);

      const draft = await workflowService.submitTicker(id, 'msft');

      expect(draft.ticker).toEqual({
        status: 'resolved',
        ticker: 'MSFT',
        companyName: 'Microsoft Corporation',
      });
      expect(draft.phase).toBe('editing');
    });

    it('should leave the draft unchanged on invalid input', async () => {
      const { id } = await workflowService.startDraft(1);

      await expect(workflowService.submitTicker(id, '')).rejects.toThrow(ValidationError);

      const draft = await workflowService.getDraft(id);
      expect(draft.ticker).toEqual({ status: 'editing', input: '', error: null });
      expect(mockDirectoryRepo.findByTicker).not.toHaveBeenCalled();
    });

    it('should return the ticker step to editing with the lookup error', async () => {
      const { id } = await workflowService.startDraft(1);

      await expect(workflowService.submitTicker(id, 'ZZZZ')).rejects.toThrow(NotFoundError);

      const draft = await workflowService.getDraft(id);
      expect(draft.ticker).toEqual({
        status: 'editing',
        input: 'ZZZZ',
        error: 'Ticker ZZZZ not found',
      });
      expect(draft.phase).toBe('editing');
    });

    it('should record a generic message when the lookup fails unexpectedly', async () => {
      mockDirectoryRepo.findByTicker.mockRejectedValue(new Error('connection reset'));
      const { id } = await workflowService.startDraft(1);

      await expect(workflowService.submitTicker(id, 'MSFT')).rejects.toThrow('connection reset');

      const draft = await workflowService.getDraft(id);
      expect(draft.ticker).toEqual({
        status: 'editing',
        input: 'MSFT',
        error: 'Ticker lookup failed',
      });
    });
  });

  describe('submitTicker while other steps change', () => {
    it('should keep a share count submitted while the lookup is running', async () => {
      const finishLookup = deferLookup();
      const { id } = await workflowService.startDraft(1);

      const submitting = workflowService.submitTicker(id, 'MSFT');
      await flush();
      await workflowService.submitShareCount(id, 12);
      finishLookup(MSFT_ENTRY);
      const draft = await submitting;

      expect(draft.ticker).toEqual({
        status: 'resolved',
        ticker: 'MSFT',
        companyName: 'Microsoft Corporation',
      });
      expect(draft.shareCount).toEqual({ status: 'submitted', shareCount: 12 });
      expect(draft.phase).toBe('readyToAdd');
    });

    it('should ignore the outcome of a lookup superseded by a newer ticker', async () => {
      const finishLookup = deferLookup();
      const { id } = await workflowService.startDraft(1);

      const first = workflowService.submitTicker(id, 'ZZZZ');
      await flush();
      await workflowService.submitTicker(id, 'MSFT');
      finishLookup(null);

      await expect(first).rejects.toThrow('Ticker ZZZZ not found');
      const draft = await workflowService.getDraft(id);
      expect(draft.ticker).toEqual({
        status: 'resolved',
        ticker: 'MSFT',
        companyName: 'Microsoft Corporation',
      });
    });

    it('should not bring back a draft cancelled during the lookup', async () => {
      const finishLookup = deferLookup();
      const { id } = await workflowService.startDraft(1);

      const submitting = workflowService.submitTicker(id, 'MSFT');
      await flush();
      await workflowService.cancelDraft(id);
      finishLookup(MSFT_ENTRY);

      await expect(submitting).rejects.toThrow(`Draft ${id} not found or expired`);
      await expect(workflowService.getDraft(id)).rejects.toThrow(NotFoundError);
    });
  });

  describe('submitShareCount', () => {
    it('should accept a numeric string', async () => {
      const { id } = await workflowService.startDraft(1);

      const draft = await workflowService.submitShareCount(id, '12');

      expect(draft.shareCount).toEqual({ status: 'submitted', shareCount: 12 });
    });

    it.each([0, -5, 2.5, 'twelve'])('should reject %p and keep the draft unchanged', async (raw) => {
      const { id } = await workflowService.startDraft(1);

      await expect(workflowService.submitShareCount(id, raw)).rejects.toThrow(ValidationError);

      const draft = await workflowService.getDraft(id);
      expect(draft.shareCount).toEqual({ status: 'editing', input: '', error: null });
    });
  });

  describe('commitDraft', () => {
    it('should append exactly one equity and close the draft', async () => {
      const { id } = await workflowService.startDraft(9);
      await workflowService.submitTicker(id, 'MSFT');
      const ready = await workflowService.submitShareCount(id, 12);
      expect(ready.phase).toBe('readyToAdd');

      const result = await workflowService.commitDraft(id);

      expect(result).toEqual({
        portfolioId: 9,
        merged: false,
        equity: {
          ticker: 'MSFT',
          companyName: 'Microsoft Corporation',
          shareCount: 12,
          addedAt: '2024-03-01T14:30:00.000Z',
        },
      });
      expect(await portfolioRepo.findEquities(9)).toHaveLength(1);
      await expect(workflowService.getDraft(id)).rejects.toThrow(
        `Draft ${id} not found or expired`
      );
    });

    it('should name the missing steps when the draft is not ready', async () => {
      const { id } = await workflowService.startDraft(9);

      await expect(workflowService.commitDraft(id)).rejects.toThrow(
        new BusinessRuleError(
          'Draft is not ready to add: ticker is not resolved and share count is not submitted'
        )
      );
      expect(await portfolioRepo.findEquities(9)).toEqual([]);
      await expect(workflowService.getDraft(id)).resolves.toMatchObject({ id, phase: 'editing' });
    });

    it('should add the equity once when the same draft is committed twice at the same time', async () => {
      const { id } = await workflowService.startDraft(9);
      await workflowService.submitTicker(id, 'MSFT');
      await workflowService.submitShareCount(id, 10);

      const results = await Promise.allSettled([
        workflowService.commitDraft(id),
        workflowService.commitDraft(id),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      expect(results[1]).toEqual({
        status: 'rejected',
        reason: new NotFoundError(`Draft ${id} not found or expired`),
      });
      const equities = await portfolioRepo.findEquities(9);
      expect(equities.map((equity) => equity.shareCount)).toEqual([10]);
    });

    it('should keep the draft open when the portfolio refuses the equity', async () => {
      await portfolioRepo.addOrAccumulate(
        9,
        { ticker: 'MSFT', companyName: 'Microsoft Corporation', shareCount: 999_995 },
        { maxShareCount: 1_000_000, maxEquities: 500 }
      );
      const { id } = await workflowService.startDraft(9);
      await workflowService.submitTicker(id, 'MSFT');
      await workflowService.submitShareCount(id, 10);

      await expect(workflowService.commitDraft(id)).rejects.toThrow(BusinessRuleError);

      await expect(workflowService.getDraft(id)).resolves.toMatchObject({ id, phase: 'readyToAdd' });
      expect((await portfolioRepo.findEquity(9, 'MSFT'))?.shareCount).toBe(999_995);
    });

    it('should merge when the ticker is already held', async () => {
      for (const shareCount of [3, 4]) {
        const { id } = await workflowService.startDraft(9);
        await workflowService.submitTicker(id, 'MSFT');
        await workflowService.submitShareCount(id, shareCount);
        await workflowService.commitDraft(id);
      }

      const equities = await portfolioRepo.findEquities(9);
      expect(equities).toHaveLength(1);
      expect(equities[0]?.shareCount).toBe(7);
    });
  });

  describe('cancelDraft', () => {
    it('should discard the draft without touching the portfolio', async () => {
      const { id } = await workflowService.startDraft(9);
      await workflowService.submitTicker(id, 'MSFT');
      await workflowService.submitShareCount(id, 5);

      await workflowService.cancelDraft(id);

      await expect(workflowService.getDraft(id)).rejects.toThrow(NotFoundError);
      expect(await portfolioRepo.findEquities(9)).toEqual([]);
    });
  });

  describe('expiry', () => {
    it('should forget a draft untouched for 30 minutes', async () => {
      const { id } = await workflowService.startDraft(1);

      clock = new Date('2024-03-01T15:00:00.000Z');

      await expect(workflowService.getDraft(id)).rejects.toThrow(NotFoundError);
    });

    it('should slide the expiry window on every change', async () => {
      const { id } = await workflowService.startDraft(1);

      clock = new Date('2024-03-01T14:50:00.000Z');
      const draft = await workflowService.submitShareCount(id, 1);
      expect(draft.expiresAt).toBe('2024-03-01T15:20:00.000Z');

      clock = new Date('2024-03-01T15:10:00.000Z');
      await expect(workflowService.getDraft(id)).resolves.toMatchObject({ id });
    });
  });
});
