import type { PoolClient } from "pg";

export interface Migration {
  id: string;
  description: string;
  run: (client: PoolClient) => Promise<void>;
}
