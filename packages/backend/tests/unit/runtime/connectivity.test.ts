import { describe, expect, it } from "vitest";
import {
  checkExtractionStoreConnection,
  checkGraphDatabaseConnection
} from "../../../src/runtime/connectivity.js";
import { FakeGraphDatabase } from "../../helpers/FakeGraphDatabase.js";
import { InMemoryExtractionStore } from "../../helpers/InMemoryExtractionStore.js";

describe("connectivity checks", () => {
  it("skips the graph database when it is not configured", async () => {
    const graphDatabase = new FakeGraphDatabase();

    const status = await checkGraphDatabaseConnection({ graphDatabase, isConfigured: () => false });

    expect(status).toBe("not_configured");
    expect(graphDatabase.connected).toBe(false);
  });

  it("connects and probes a configured graph database", async () => {
    const graphDatabase = new FakeGraphDatabase();

    expect(await checkGraphDatabaseConnection({ graphDatabase, isConfigured: () => true })).toBe("ok");

    graphDatabase.healthy = false;
    expect(await checkGraphDatabaseConnection({ graphDatabase, isConfigured: () => true })).toBe("failed");
  });

  it("reports a failed connection", async () => {
    const graphDatabase = new FakeGraphDatabase();
    graphDatabase.connectError = new Error("connection refused");

    expect(await checkGraphDatabaseConnection({ graphDatabase, isConfigured: () => true })).toBe("failed");
  });

  it("probes the extraction store by listing customers", async () => {
    const extractionStore = new InMemoryExtractionStore();
    expect(await checkExtractionStoreConnection({ extractionStore })).toBe("ok");

    extractionStore.listCustomers = async () => {
      throw new Error("disk unavailable");
    };
    expect(await checkExtractionStoreConnection({ extractionStore })).toBe("failed");
  });
});
