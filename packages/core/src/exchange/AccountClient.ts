import type { AccountSnapshot } from "../types";

/**
 * Read-only view of the trading account: wallet balances and open
 * positions.
 */
export interface AccountClient {
	/**
	 * Non-zero balances and non-flat positions.
	 * @throws ExchangeError
	 */
	getAccount(): Promise<AccountSnapshot>;
}
