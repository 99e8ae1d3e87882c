import axios, { type AxiosInstance } from "axios";
import type { PriceSample, PriceSource } from "../engine/types";
import { NetworkError, toError } from "../errors/app.errors";
import { sanitizeErrorMessage } from "../utils/sanitize-axios-error.util";

type SpotResponse = { data?: { amount?: unknown } };

/** BTC-USD spot price from Coinbase's public API. */
export class CoinbasePriceFeed implements PriceSource {
  private readonly http: AxiosInstance;
  private readonly spotUrl: string;
  private readonly clock: () => number;

  constructor(params: { spotUrl: string; timeoutMs: number; http?: AxiosInstance; clock?: () => number }) {
    this.spotUrl = params.spotUrl;
    this.http = params.http ?? axios.create({ timeout: params.timeoutMs });
    this.clock = params.clock ?? Date.now;
  }

  async getPriceSample(asset: string): Promise<PriceSample> {
    let body: SpotResponse;
    try {
      const response = await this.http.get<SpotResponse>(this.spotUrl);
      body = response.data;
    } catch (err) {
      throw new NetworkError(`${asset} spot request failed: ${sanitizeErrorMessage(err)}`, this.spotUrl, toError(err));
    }
    const price = Number(body?.data?.amount);
    if (!Number.isFinite(price) || price <= 0) {
      throw new NetworkError(`${asset} spot response had no usable amount`, this.spotUrl);
    }
    return { timestamp: this.clock(), price };
  }
}
