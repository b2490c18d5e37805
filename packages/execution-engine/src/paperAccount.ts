import type { Direction } from "@momentumx/core";

export interface ClosedTrade {
	instrument: string;
	direction: Direction;
	size: number;
	entryPrice: number;
	exitPrice: number;
	realizedPnl: number;
	closedAt: number;
}

export interface TradeTally {
	total: number;
	wins: number;
	losses: number;
	breakeven: number;
}

export interface PaperAccountSnapshot {
	startingBalance: number;
	balance: number;
	equity: number;
	totalRealizedPnl: number;
	maxEquity: number;
	maxDrawdown: number;
	trades: TradeTally;
	/** Realized P&L keyed by instrument symbol */
	pnlByInstrument: Record<string, number>;
	lastTrade?: ClosedTrade;
}

const RECENT_TRADES_LIMIT = 100;

const emptyTally = (): TradeTally => ({ total: 0, wins: 0, losses: 0, breakeven: 0 });

/**
 * Cash ledger behind the paper provider. Balance only moves on closed
 * trades; equity is balance plus whatever unrealized P&L the caller marks.
 */
export class PaperAccount {
	private balance: number;
	private equity: number;
	private maxEquity: number;
	private maxDrawdown = 0;
	private readonly tally = emptyTally();
	private readonly pnlByInstrument = new Map<string, number>();
	private readonly recent: ClosedTrade[] = [];

	constructor(private readonly startingBalance: number) {
		this.balance = startingBalance;
		this.equity = startingBalance;
		this.maxEquity = startingBalance;
	}

	registerClosedTrade(trade: ClosedTrade): PaperAccountSnapshot {
		this.balance += trade.realizedPnl;
		this.tally.total += 1;
		if (trade.realizedPnl > 0) {
			this.tally.wins += 1;
		} else if (trade.realizedPnl < 0) {
			this.tally.losses += 1;
		} else {
			this.tally.breakeven += 1;
		}

		this.pnlByInstrument.set(
			trade.instrument,
			(this.pnlByInstrument.get(trade.instrument) ?? 0) + trade.realizedPnl
		);
		this.recent.push(trade);
		if (this.recent.length > RECENT_TRADES_LIMIT) {
			this.recent.shift();
		}

		return this.snapshot(0);
	}

	/** Most recent closed trades, oldest first. */
	recentTrades(): readonly ClosedTrade[] {
		return [...this.recent];
	}

	snapshot(unrealizedPnl: number): PaperAccountSnapshot {
		this.equity = this.balance + unrealizedPnl;
		this.maxEquity = Math.max(this.maxEquity, this.equity);
		this.maxDrawdown = Math.max(this.maxDrawdown, this.maxEquity - this.equity);

		return {
			startingBalance: this.startingBalance,
			balance: this.balance,
			equity: this.equity,
			totalRealizedPnl: this.balance - this.startingBalance,
			maxEquity: this.maxEquity,
			maxDrawdown: this.maxDrawdown,
			trades: { ...this.tally },
			pnlByInstrument: Object.fromEntries(this.pnlByInstrument),
			lastTrade: this.recent[this.recent.length - 1],
		};
	}
}
