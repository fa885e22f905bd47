export type ReindexBatch = {
  resourceType: string;
  ids: string[];
  fields: string[];
};

export interface Reindexer {
  reindex(batch: ReindexBatch): Promise<void>;
}
