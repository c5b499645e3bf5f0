import type { Migration } from "./migration";

export const migration001: Migration = {
  id: "001_documents",
  description: "Documents, chunks and the term index",
  run: async (client) => {
    await client.query(`
      CREATE TABLE IF NOT EXISTS document (
        id text PRIMARY KEY,
        title text NOT NULL,
        body text NOT NULL,
        format text NOT NULL DEFAULT 'text',
        metadata jsonb NOT NULL DEFAULT '{}'::jsonb,
        status text NOT NULL DEFAULT 'pending',
        chunk_count integer NOT NULL DEFAULT 0,
        error text,
        created_at timestamptz NOT NULL DEFAULT now(),
        updated_at timestamptz NOT NULL DEFAULT now()
      );
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS document_chunk (
        id text PRIMARY KEY,
        document_id text NOT NULL REFERENCES document(id) ON DELETE CASCADE,
        sequence_index integer NOT NULL,
        content text NOT NULL,
        fingerprint text NOT NULL,
        embedding jsonb,
        embedding_space text,
        embedding_source text,
        keywords jsonb NOT NULL DEFAULT '[]'::jsonb,
        word_count integer NOT NULL,
        char_count integer NOT NULL,
        start_offset integer NOT NULL,
        end_offset integer NOT NULL,
        overlap_chars integer NOT NULL DEFAULT 0,
        created_at timestamptz NOT NULL DEFAULT now(),
        UNIQUE (document_id, sequence_index)
      );
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS document_chunk_space_idx
      ON document_chunk(embedding_space);
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS document_chunk_fingerprint_idx
      ON document_chunk(fingerprint);
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS chunk_term (
        chunk_id text NOT NULL REFERENCES document_chunk(id) ON DELETE CASCADE,
        document_id text NOT NULL,
        term text NOT NULL,
        freq integer NOT NULL,
        PRIMARY KEY (chunk_id, term)
      );
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS chunk_term_term_idx
      ON chunk_term(term);
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS chunk_term_document_idx
      ON chunk_term(document_id);
    `);
  },
};
