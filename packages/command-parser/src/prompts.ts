export const EXAMPLE_COMMANDS = [
	"Buy 0.5 BTC using TWAP over 1 hour with 12 slices",
	"Set up grid for SOL between $130 and $150 with 10 grids",
	"Execute TWAP for 1 ETH over 30 minutes, pause if bearish",
	"Create grid bot for BTC from 60000 to 65000, 20 grids",
	"Sell 1 ETH using TWAP over 2 hours if sentiment above 70",
	"Market buy 0.01 BTC",
] as const;

export const buildParsePrompt = (command: string): string => `You turn natural language trading commands for Binance USD-M futures into JSON.

STRATEGIES:
- "twap": split one order into equal slices over a time window
- "grid": place limit orders at evenly spaced levels inside a price range
- "market": a single market order, executed at once

PARAMETERS:
- symbol: trading pair such as "BTCUSDT". BTC/Bitcoin -> BTCUSDT, ETH/Ethereum -> ETHUSDT, SOL/Solana -> SOLUSDT
- side: "BUY" or "SELL" (default "BUY")
- quantity: amount in base asset
- duration_seconds: TWAP window in seconds ("30 minutes" -> 1800, "2 hours" -> 7200)
- num_orders: TWAP slice count
- lower_price, upper_price: grid range
- grids: grid level count
- quantity_per_grid: amount per grid level
- conditions (optional): rsi_below, rsi_above, sentiment_above, sentiment_below (0-100), pause_on_bearish (boolean)

Respond with JSON only, no markdown:
{"intent": "twap" | "grid" | "market", "parameters": {...}, "confidence": 0.0-1.0, "error": null | "why the command is unclear"}

EXAMPLES:
Input: Set up a grid for SOL between $130 and $150 with 10 grids, 0.5 SOL each, only if RSI is below 40
Output: {"intent": "grid", "parameters": {"symbol": "SOLUSDT", "lower_price": 130, "upper_price": 150, "grids": 10, "quantity_per_grid": 0.5, "conditions": {"rsi_below": 40}}, "confidence": 0.95, "error": null}
Input: Buy 0.5 BTC using TWAP over 2 hours with 12 slices, pause if sentiment goes bearish
Output: {"intent": "twap", "parameters": {"symbol": "BTCUSDT", "side": "BUY", "quantity": 0.5, "duration_seconds": 7200, "num_orders": 12, "conditions": {"pause_on_bearish": true}}, "confidence": 0.92, "error": null}

COMMAND:
${command}`;
