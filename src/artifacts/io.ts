import { createWriteStream } from "node:fs";
import { rename, writeFile } from "node:fs/promises";
import { once } from "node:events";
import { finished } from "node:stream/promises";

/** Append-only JSON Lines sink; one record per line, written in call order. */
export interface JsonlWriter<T> {
  readonly path: string;
  append: (record: T) => Promise<void>;
  close: () => Promise<void>;
}

export const createJsonlWriter = <T>(path: string): JsonlWriter<T> => {
  const stream = createWriteStream(path, { flags: "a", encoding: "utf8" });
  let streamError: Error | null = null;
  let closed = false;

  stream.on("error", (error) => {
    streamError = error;
  });

  return {
    path,
    append: async (record: T) => {
      if (closed) {
        throw new Error(`JSONL writer is closed: ${path}`);
      }
      if (streamError) {
        throw streamError;
      }
      if (!stream.write(`${JSON.stringify(record)}\n`)) {
        await once(stream, "drain");
      }
    },
    close: async () => {
      if (closed) {
        return;
      }
      closed = true;
      if (streamError) {
        throw streamError;
      }
      stream.end();
      await finished(stream);
    }
  };
};

/** Replaces `path` with `content` via a sibling temp file and a rename. */
export const writeTextAtomic = async (path: string, content: string): Promise<void> => {
  const tmpPath = `${path}.tmp`;
  await writeFile(tmpPath, content, "utf8");
  await rename(tmpPath, path);
};
