import { MongoServerError } from "mongodb";
import { ReconcileError } from "../src/errors";
import { applyIndexPlan, toIndexDocument } from "../src/indexes/applier";
import { readIndexCatalog } from "../src/indexes/catalog-reader";
import { diffIndexes } from "../src/indexes/diff-engine";
import { ReconciliationPlan } from "../src/types/indexes";
import { FakeDatabase, captureError, silenceConsole } from "./test-utils";

describe("applyIndexPlan", () => {
  silenceConsole();

  let db: FakeDatabase;

  beforeEach(() => {
    db = new FakeDatabase();
  });

  async function planFor(
    collectionName: string,
    declared: Parameters<typeof diffIndexes>[0]
  ): Promise<ReconciliationPlan> {
    const plan = diffIndexes(declared, await readIndexCatalog(db, collectionName));
    db.clearRequests();
    return plan;
  }

  test("merges keys and options into one creation document", () => {
    expect(
      toIndexDocument({
        name: "ttl",
        keys: { createdAt: 1 },
        options: { name: "ttl", expireAfterSeconds: 60 },
      })
    ).toEqual({ key: { createdAt: 1 }, name: "ttl", expireAfterSeconds: 60 });
  });

  test("issues nothing for an empty plan", async () => {
    await applyIndexPlan(db, "users", {
      toCreate: new Map(),
      toDrop: new Set(),
      unchanged: new Set(["email_1"]),
    });

    expect(db.requests).toHaveLength(0);
  });

  test("creates all missing indexes in one request", async () => {
    const plan = await planFor("users", [
      { keys: { email: 1 }, options: { unique: true } },
      { keys: { tenantId: 1, createdAt: -1 } },
    ]);

    await applyIndexPlan(db, "users", plan);

    expect(db.requests).toEqual([
      {
        type: "createIndexes",
        collection: "users",
        payload: {
          createIndexes: "users",
          indexes: [
            { key: { email: 1 }, unique: true, name: "email_1" },
            { key: { tenantId: 1, createdAt: -1 }, name: "tenantId_1_createdAt_-1" },
          ],
        },
      },
    ]);
    expect(db.indexNames("users")).toEqual(["_id_", "email_1", "tenantId_1_createdAt_-1"]);
  });

  test("drops before creating when an index is replaced", async () => {
    db.seedCollection("users", {
      indexes: [{ v: 2, key: { a: 1 }, name: "a_1", unique: false }],
    });
    const plan = await planFor("users", [{ keys: { a: 1 }, options: { unique: true } }]);

    await applyIndexPlan(db, "users", plan);

    expect(db.requests.map((request) => request.type)).toEqual([
      "dropIndexes",
      "createIndexes",
    ]);
    expect(db.requests[0].payload).toEqual({ dropIndexes: "users", index: "a_1" });
    expect(db.indexNames("users")).toEqual(["_id_", "a_1"]);
  });

  test("stops at a failed drop and names the index", async () => {
    db.seedCollection("users", { indexes: [{ v: 2, key: { legacy: 1 }, name: "legacy_1" }] });
    const plan = await planFor("users", [{ keys: { email: 1 } }]);
    db.failNext(
      "dropIndexes",
      new MongoServerError({ message: "not authorized", code: 13, codeName: "Unauthorized" })
    );

    const error = await captureError(applyIndexPlan(db, "users", plan), ReconcileError);

    expect(error.kind).toBe("IndexOperationFailed");
    expect(error.indexName).toBe("legacy_1");
    expect(db.requestsOfType("createIndexes")).toHaveLength(0);
  });

  test("surfaces a failed creation with the index names", async () => {
    const plan = await planFor("users", [{ keys: { email: 1 } }]);
    db.failNext("createIndexes", new Error("disk full"));

    const error = await captureError(applyIndexPlan(db, "users", plan), ReconcileError);

    expect(error.kind).toBe("IndexOperationFailed");
    expect(error.indexName).toBe("email_1");
    expect(error.message).toBe(
      "Failed to create index(es) 'email_1' on 'test.users': Error: disk full"
    );
  });
});
