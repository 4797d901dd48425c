import Decimal from 'decimal.js';
import {
  DailyPerformance,
  EquityPerformance,
  LiveActivityPayload,
  PriceChange,
  Quote,
} from '@/models';
import { IPortfolioRepository, IQuoteRepository } from '@/repositories/interfaces';
import { LIVE_ACTIVITY_EMOJI, LiveActivityEmoji, PORTFOLIO_DISPLAY } from '@/constants/portfolio';
import { logger } from '@/adapters/logging/LoggerFactory';
import { formatChange } from '@/utils/formatChange';
import { RecordQuoteDTO } from '@/validators/equity.validator';
import { EquityDirectoryService } from './equityDirectory.service';

/**
 * Performance Service
 * Daily change of a portfolio between the previous close and the current price
 */
export class PerformanceService {
  constructor(
    private portfolioRepo: IPortfolioRepository,
    private quoteRepo: IQuoteRepository,
    private directoryService: EquityDirectoryService,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Store the latest prices for a ticker
   * @throws NotFoundError when the ticker is not in the directory
   */
  async recordQuote(rawTicker: unknown, prices: RecordQuoteDTO): Promise<Quote> {
    const entry = await this.directoryService.lookupTicker(rawTicker);

    const quote = await this.quoteRepo.upsertQuote({
      ticker: entry.ticker,
      previousClose: prices.previousClose,
      currentPrice: prices.currentPrice,
      asOf: this.now().toISOString(),
    });

    logger.debug({ ticker: quote.ticker }, 'Quote recorded');
    return quote;
  }

  /**
   * Dollar and percent change of the whole portfolio
   *
   * If any held ticker has no quote, the totals report zero change and
   * complete = false; the breakdown still lists the tickers that do have one.
   */
  async getDailyPerformance(portfolioId: number): Promise<DailyPerformance> {
    const equities = await this.portfolioRepo.findEquities(portfolioId);
    const quotes = await this.quoteRepo.findQuotes(equities.map((e) => e.ticker));

    const missingTickers: string[] = [];
    const breakdown: EquityPerformance[] = [];
    let valueAtPreviousClose = new Decimal(0);
    let currentValue = new Decimal(0);
    let asOf: string | null = null;

    for (const equity of equities) {
      const quote = quotes.get(equity.ticker);
      if (!quote) {
        missingTickers.push(equity.ticker);
        continue;
      }

      const previous = new Decimal(equity.shareCount).times(quote.previousClose);
      const current = new Decimal(equity.shareCount).times(quote.currentPrice);
      valueAtPreviousClose = valueAtPreviousClose.plus(previous);
      currentValue = currentValue.plus(current);

      if (asOf === null || quote.asOf < asOf) {
        asOf = quote.asOf;
      }

      breakdown.push({
        ticker: equity.ticker,
        shareCount: equity.shareCount,
        ...priceChange(previous, current),
      });
    }

    if (missingTickers.length > 0) {
      logger.warn({ portfolioId, missingTickers }, 'Quotes missing; reporting zero daily change');

      return {
        portfolioId,
        complete: false,
        missingTickers,
        ...priceChange(new Decimal(0), new Decimal(0)),
        equities: breakdown,
        asOf,
      };
    }

    return {
      portfolioId,
      complete: true,
      missingTickers,
      ...priceChange(valueAtPreviousClose, currentValue),
      equities: breakdown,
      asOf,
    };
  }

  /**
   * Live Activity display payload for the portfolio's daily direction
   */
  async getLiveActivity(portfolioId: number): Promise<LiveActivityPayload> {
    const performance = await this.getDailyPerformance(portfolioId);

    return {
      attributes: { name: PORTFOLIO_DISPLAY.TITLE },
      contentState: { emoji: directionEmoji(performance) },
    };
  }
}

/**
 * Dollar change rounded to cents; percent change is the rounded dollar
 * change over the previous value, as a fraction rounded to 4 places.
 */
function priceChange(previous: Decimal, current: Decimal): PriceChange {
  const dollarChange = current.minus(previous).toDecimalPlaces(2);
  const percentChange = previous.greaterThan(0)
    ? dollarChange.dividedBy(previous).toDecimalPlaces(4)
    : new Decimal(0);

  return {
    valueAtPreviousClose: previous.toDecimalPlaces(2).toNumber(),
    currentValue: current.toDecimalPlaces(2).toNumber(),
    dollarChange: dollarChange.toNumber(),
    percentChange: percentChange.toNumber(),
    formatted: formatChange(dollarChange, percentChange),
  };
}

function directionEmoji(performance: DailyPerformance): LiveActivityEmoji {
  if (!performance.complete || performance.dollarChange === 0) {
    return LIVE_ACTIVITY_EMOJI.FLAT;
  }
  return performance.dollarChange > 0 ? LIVE_ACTIVITY_EMOJI.UP : LIVE_ACTIVITY_EMOJI.DOWN;
}
