import { DatabaseHandle } from "../types/database";
import { ModelSyncResult } from "../types/models";
import { ModelRegistry } from "../models/registry";

export interface BootState {
  ready: boolean;
  syncedAt?: Date;
  results: ModelSyncResult[];
}

export interface AppContext {
  db: DatabaseHandle;
  registry: ModelRegistry;
  state: BootState;
}

export function createBootState(): BootState {
  return { ready: false, results: [] };
}
