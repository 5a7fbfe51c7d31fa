import { MongoServerError } from "mongodb";
import { ReconcileError } from "../src/errors";
import { parseCatalogEntry, readIndexCatalog } from "../src/indexes/catalog-reader";
import { FakeDatabase, captureError } from "./test-utils";

describe("readIndexCatalog", () => {
  let db: FakeDatabase;

  beforeEach(() => {
    db = new FakeDatabase();
  });

  test("treats a missing collection as an empty catalog", async () => {
    const catalog = await readIndexCatalog(db, "users");

    expect(catalog.size).toBe(0);
    expect(db.requestsOfType("listIndexes")).toHaveLength(1);
  });

  test("treats a NamespaceNotFound error code as an empty catalog", async () => {
    db.seedCollection("users", { indexes: [{ v: 2, key: { email: 1 }, name: "email_1" }] });
    db.failNext(
      "listIndexes",
      new MongoServerError({ message: "ns does not exist", code: 26, codeName: "NamespaceNotFound" })
    );

    const catalog = await readIndexCatalog(db, "users");

    expect(catalog.size).toBe(0);
  });

  test("keys entries by name and leaves out the primary-key index", async () => {
    db.seedCollection("users", {
      indexes: [
        { v: 2, key: { email: 1 }, name: "unique-email", unique: true },
        { v: 2, key: { tenantId: 1, createdAt: -1 }, name: "tenantId_1_createdAt_-1" },
      ],
    });

    const catalog = await readIndexCatalog(db, "users");

    expect([...catalog.keys()]).toEqual(["unique-email", "tenantId_1_createdAt_-1"]);
    expect(catalog.get("unique-email")).toEqual({
      name: "unique-email",
      canonicalName: "email_1",
      keys: { email: 1 },
      options: { name: "unique-email", unique: true },
    });
    expect(catalog.has("_id_")).toBe(false);
  });

  test("strips bookkeeping fields from the option set", async () => {
    db.seedCollection("places", {
      indexes: [
        {
          v: 2,
          key: { location: "2dsphere" },
          name: "location_2dsphere",
          ns: "test.places",
          "2dsphereIndexVersion": 3,
          background: true,
        },
      ],
    });

    const catalog = await readIndexCatalog(db, "places");

    expect(catalog.get("location_2dsphere")?.options).toEqual({ name: "location_2dsphere" });
  });

  test("surfaces other listing failures as CatalogUnavailable", async () => {
    db.seedCollection("users");
    db.failNext("listIndexes", new Error("connection reset"));

    const error = await captureError(readIndexCatalog(db, "users"), ReconcileError);

    expect(error.kind).toBe("CatalogUnavailable");
    expect(error.namespace).toBe("test.users");
    expect(error.message).toBe(
      "Error while fetching current indexes for 'test.users': Error: connection reset"
    );
  });

  test("rejects an entry without a key document", async () => {
    db.seedCollection("users", { indexes: [{ v: 2, name: "broken" }] });

    const error = await captureError(readIndexCatalog(db, "users"), ReconcileError);

    expect(error.kind).toBe("MalformedCatalogEntry");
  });

  test("rejects an entry without a name", async () => {
    db.seedCollection("users", { indexes: [{ v: 2, key: { email: 1 } }] });

    const error = await captureError(readIndexCatalog(db, "users"), ReconcileError);

    expect(error.kind).toBe("MalformedCatalogEntry");
    expect(error.message).toBe("Index document on 'test.users' has no 'name' field");
  });
});

describe("parseCatalogEntry", () => {
  test("rejects key tokens that are neither numbers nor strings", () => {
    expect(() =>
      parseCatalogEntry({ key: { email: true }, name: "email_true" }, "test.users")
    ).toThrow(ReconcileError);
  });

  test("keeps index-specific options", () => {
    const entry = parseCatalogEntry(
      {
        v: 2,
        key: { _fts: "text", _ftsx: 1 },
        name: "title_text",
        weights: { title: 1 },
        default_language: "english",
        language_override: "language",
        textIndexVersion: 3,
      },
      "test.posts"
    );

    expect(entry.canonicalName).toBe("_fts_text__ftsx_1");
    expect(entry.options).toEqual({
      name: "title_text",
      weights: { title: 1 },
      default_language: "english",
      language_override: "language",
    });
  });
});
