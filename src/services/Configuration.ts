import { IConfiguration } from "../interfaces/services";
import { DEFAULT_API_URL, TimeUnit } from "../types/domain";
import dotenv from "dotenv";

// All env lookups go through here
export class Configuration implements IConfiguration {
  constructor(envPath?: string) {
    dotenv.config(envPath ? { path: envPath } : undefined);
  }

  get(key: string): string | undefined {
    return process.env[key];
  }

  getNumber(key: string, defaultValue: number = 0): number {
    const value = this.get(key);
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  // Only "true" (any case) is true
  getBoolean(key: string, defaultValue: boolean = false): boolean {
    const value = this.get(key);
    if (!value) return defaultValue;
    return value.toLowerCase() === "true";
  }

  getApiUrl(): string {
    return this.get("HONEST_MARK_API_URL") || DEFAULT_API_URL;
  }

  getAuthToken(): string {
    return this.get("HONEST_MARK_AUTH_TOKEN") || "";
  }

  getRequestLimit(): number {
    return this.getNumber("HONEST_MARK_REQUEST_LIMIT", 5);
  }

  getTimeUnit(): TimeUnit {
    const value = (this.get("HONEST_MARK_TIME_UNIT") || "").toUpperCase();
    const match = Object.values(TimeUnit).find((unit) => unit === value);
    return match ?? TimeUnit.MINUTES;
  }

  getRequestTimeout(): number {
    return this.getNumber("HTTP_TIMEOUT_MS", 30000);
  }

  getMockPort(): number {
    return this.getNumber("MOCK_PORT", 3001);
  }

  getLogLevel(): string {
    return this.get("LOG_LEVEL") || "info";
  }

  shouldLogToFile(): boolean {
    return this.getBoolean("LOG_TO_FILE", false);
  }

  getNodeEnv(): string {
    return this.get("NODE_ENV") || "development";
  }
}
