import { describe, test } from "node:test";
import assert from "node:assert/strict";
import axios from "axios";
import type { AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { NetworkError } from "../../src/errors/app.errors";
import { CoinbasePriceFeed } from "../../src/provider/coinbase.price-feed";

function createFeed(body: unknown): CoinbasePriceFeed {
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => ({
      data: body,
      status: 200,
      statusText: "OK",
      headers: {},
      config,
    }),
  });
  return new CoinbasePriceFeed({ spotUrl: "https://prices.test/spot", timeoutMs: 1_000, http, clock: () => 1_000 });
}

describe("CoinbasePriceFeed", () => {
  test("stamps the spot amount with the local clock", async () => {
    const sample = await createFeed({ data: { amount: "67000.12", currency: "USD" } }).getPriceSample("BTC");
    assert.deepEqual(sample, { timestamp: 1_000, price: 67000.12 });
  });

  test("rejects a response without a usable amount", async () => {
    await assert.rejects(createFeed({ data: {} }).getPriceSample("BTC"), (err: unknown) => {
      assert.ok(err instanceof NetworkError);
      assert.equal(err.message, "BTC spot response had no usable amount");
      return true;
    });
  });
});
