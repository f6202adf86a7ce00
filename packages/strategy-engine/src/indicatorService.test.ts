import { describe, expect, it, vi } from "vitest";
import type { MarketDataClient } from "@slicebot/core";
import { RsiIndicatorService } from "./indicatorService";

const rising = Array.from({ length: 50 }, (_, index) => 100 + index);

const createMarketData = (
	fetchCloses: MarketDataClient["fetchCloses"]
): MarketDataClient => ({
	getCurrentPrice: async () => 100,
	fetchCloses,
});

describe("RsiIndicatorService", () => {
	it("computes RSI over the configured lookback", async () => {
		const fetchCloses = vi.fn(async () => rising);
		const service = new RsiIndicatorService(createMarketData(fetchCloses), {
			interval: "1h",
			lookback: 50,
		});

		await expect(service.getRsi("BTCUSDT", 14)).resolves.toBe(100);
		expect(fetchCloses).toHaveBeenCalledWith("BTCUSDT", "1h", 50);
	});

	it("fetches at least period + 1 candles", async () => {
		const fetchCloses = vi.fn(async () => rising);
		const service = new RsiIndicatorService(createMarketData(fetchCloses), {
			interval: "15m",
			lookback: 20,
		});

		await service.getRsi("ETHUSDT", 30);
		expect(fetchCloses).toHaveBeenCalledWith("ETHUSDT", "15m", 31);
	});

	it("reads as unavailable when candles cannot be fetched", async () => {
		const service = new RsiIndicatorService(
			createMarketData(async () => {
				throw new Error("socket hang up");
			}),
			{ interval: "1h", lookback: 50 }
		);

		await expect(service.getRsi("BTCUSDT", 14)).resolves.toBeNull();
	});

	it("reads as unavailable with too few candles", async () => {
		const service = new RsiIndicatorService(
			createMarketData(async () => rising.slice(0, 10)),
			{ interval: "1h", lookback: 50 }
		);

		await expect(service.getRsi("BTCUSDT", 14)).resolves.toBeNull();
	});
});
