/**
 * Change between previous close and current price
 * percentChange is a fraction (0.0123 = 1.23%)
 */
export interface PriceChange {
  valueAtPreviousClose: number;
  currentValue: number;
  dollarChange: number;
  percentChange: number;
  formatted: string; // "+1.23% (+$45.60)"
}

export interface EquityPerformance extends PriceChange {
  ticker: string;
  shareCount: number;
}

/**
 * Daily performance of a portfolio
 * When a held ticker has no quote the totals report zero change and complete = false
 */
export interface DailyPerformance extends PriceChange {
  portfolioId: number;
  complete: boolean;
  missingTickers: string[];
  equities: EquityPerformance[];
  asOf: string | null; // Oldest quote timestamp used
}

/**
 * Live Activity display payload
 * Static attributes plus the content state the widget renders
 */
export interface LiveActivityPayload {
  attributes: {
    name: string;
  };
  contentState: {
    emoji: string;
  };
}
