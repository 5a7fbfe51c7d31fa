import { MongoClient } from "mongodb";
import { ServiceConfig } from "../config";
import { DatabaseHandle } from "../types/database";

/** The part of MongoClient the service uses. */
export interface DatabaseClient {
  db(name: string): DatabaseHandle;
  close(): Promise<void>;
}

export async function connectToMongoDB(config: ServiceConfig): Promise<DatabaseClient> {
  const mongoClient = new MongoClient(config.mongodbUri);
  try {
    await mongoClient.connect();
  } catch (error) {
    console.error("MongoDB connection error:", error);
    throw error;
  }
  console.log(`Connected to MongoDB (database '${config.databaseName}')`);
  return mongoClient;
}

export async function closeConnection(client: DatabaseClient): Promise<void> {
  await client.close();
  console.log("MongoDB connection closed");
}
