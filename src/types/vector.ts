export type VectorBackendOrigin = 'native' | 'fallback';

export type VectorMetadata = Record<string, string | number | boolean | null>;

export interface VectorRecord {
  readonly id: string;
  readonly embedding: readonly number[];
  readonly metadata: VectorMetadata;
  /** Epoch milliseconds. */
  readonly createdAt: number;
  readonly backendOrigin: VectorBackendOrigin;
}

export interface ScoredVectorRecord {
  record: VectorRecord;
  /** Cosine similarity in [-1, 1]. */
  score: number;
}

/** Metadata equality filter applied to query results. */
export type VectorFilter = Partial<VectorMetadata>;

export interface VectorBackend {
  readonly origin: VectorBackendOrigin;
  /** Capability check run once at construction; false or a throw selects the fallback. */
  probe(): boolean;
  upsert(record: VectorRecord): Promise<void>;
  query(vector: readonly number[], limit: number, filter?: VectorFilter): Promise<ScoredVectorRecord[]>;
  /** Drops records by id; returns how many the backend held. */
  remove(ids: readonly string[]): Promise<number>;
  count(): Promise<number>;
}

export interface VectorStoreStatus {
  backendOrigin: VectorBackendOrigin;
  nativeAvailable: boolean;
  downgradedAt: string | null;
  downgradeReason: string | null;
  dimensions: number;
  records: number;
}
