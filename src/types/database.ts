// Driver-facing interfaces. The mongodb driver's Db and Collection satisfy these
// structurally; tests substitute an in-process fake.
import {
  CollectionOptions,
  Document,
  Filter,
  UpdateFilter,
  UpdateOptions,
  UpdateResult,
} from "mongodb";

export interface IndexListing {
  toArray(): Promise<Document[]>;
}

export interface ModelCollection {
  readonly namespace: string;
  listIndexes(): IndexListing;
  updateMany(
    filter: Filter<Document>,
    update: UpdateFilter<Document>,
    options: UpdateOptions
  ): Promise<UpdateResult>;
}

export interface DatabaseHandle {
  readonly databaseName: string;
  collection(name: string, options?: CollectionOptions): ModelCollection;
  command(command: Document): Promise<Document>;
}
