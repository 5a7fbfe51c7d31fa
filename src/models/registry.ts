import { ModelDefinitionError } from "../errors";
import { DatabaseHandle } from "../types/database";
import { ModelDefinition, ModelSyncResult } from "../types/models";
import { syncModel } from "./model";

export class ModelRegistry {
  private readonly models = new Map<string, ModelDefinition>();

  constructor(models: readonly ModelDefinition[] = []) {
    for (const model of models) {
      this.register(model);
    }
  }

  register(model: ModelDefinition): this {
    if (this.models.has(model.collectionName)) {
      throw new ModelDefinitionError(
        `A model for collection '${model.collectionName}' is already registered`
      );
    }
    this.models.set(model.collectionName, model);
    return this;
  }

  get(collectionName: string): ModelDefinition | undefined {
    return this.models.get(collectionName);
  }

  list(): ModelDefinition[] {
    return [...this.models.values()];
  }

  get size(): number {
    return this.models.size;
  }

  // Sync every model in registration order, stopping at the first failure.
  async syncAll(
    db: DatabaseHandle,
    options: { now?: () => Date } = {}
  ): Promise<ModelSyncResult[]> {
    const results: ModelSyncResult[] = [];
    for (const model of this.models.values()) {
      results.push(await syncModel(db, model, options));
    }
    return results;
  }
}
