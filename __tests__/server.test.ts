import request from "supertest";
import { MigrationError } from "../src/errors";
import { ServiceConfig } from "../src/config";
import { DatabaseClient } from "../src/database/connection";
import { intervalMigration } from "../src/migrations/interval-migration";
import { defineModel } from "../src/models/model";
import { ModelRegistry } from "../src/models/registry";
import { startServer } from "../src/server";
import { FakeDatabase, captureError, silenceConsole } from "./test-utils";

const CONFIG: ServiceConfig = {
  mongodbUri: "mongodb://localhost:27017",
  databaseName: "app",
  port: 0,
  syncOnBoot: true,
};

class FakeClient implements DatabaseClient {
  readonly database = new FakeDatabase("app");
  closed = false;

  db(): FakeDatabase {
    return this.database;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe("startServer", () => {
  silenceConsole();

  test("synchronizes models before serving and reports ready", async () => {
    const client = new FakeClient();
    const registry = new ModelRegistry([
      defineModel({ collectionName: "users", indexes: [{ keys: { email: 1 } }] }),
    ]);

    const running = await startServer(registry, CONFIG, async () => client);
    try {
      expect(client.database.indexNames("users")).toEqual(["_id_", "email_1"]);
      expect(running.state.results.map((result) => result.collectionName)).toEqual(["users"]);

      const response = await request(running.server).get("/ready");
      expect(response.status).toBe(200);
      expect(response.body.ready).toBe(true);
    } finally {
      await running.close();
    }
    expect(client.closed).toBe(true);
  });

  test("refuses to serve when a model fails to sync", async () => {
    const client = new FakeClient();
    const registry = new ModelRegistry([
      defineModel({
        collectionName: "users",
        migrations: [
          intervalMigration({ name: "broken", threshold: new Date("2100-01-01T00:00:00.000Z"), filter: {} }),
        ],
      }),
    ]);

    const error = await captureError(
      startServer(registry, CONFIG, async () => client),
      MigrationError
    );

    expect(error.kind).toBe("MigrationDeclarationInvalid");
    expect(client.closed).toBe(true);
  });

  test("closes the database client when the port is taken", async () => {
    const holder = await startServer(new ModelRegistry(), CONFIG, async () => new FakeClient());
    try {
      const address = holder.server.address();
      if (typeof address !== "object" || address === null) {
        throw new Error("expected a bound TCP address");
      }
      const { port } = address;
      const client = new FakeClient();

      await expect(
        startServer(new ModelRegistry(), { ...CONFIG, port }, async () => client)
      ).rejects.toThrow("EADDRINUSE");
      expect(client.closed).toBe(true);
    } finally {
      await holder.close();
    }
  });

  test("skips the sync when disabled", async () => {
    const client = new FakeClient();
    const registry = new ModelRegistry([
      defineModel({ collectionName: "users", indexes: [{ keys: { email: 1 } }] }),
    ]);

    const running = await startServer(
      registry,
      { ...CONFIG, syncOnBoot: false },
      async () => client
    );
    try {
      expect(running.state.ready).toBe(true);
      expect(client.database.requests).toHaveLength(0);
    } finally {
      await running.close();
    }
  });
});
