import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import type { GeoPair, GridConverter } from "../types/geo";

export const createMemorySink = () => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });
  return { stream, text: () => chunks.join("") };
};

/** Converter stand-in that only knows the references it is given. */
export const createStubConverter = (known: Record<string, GeoPair>) => {
  const calls: string[] = [];
  const converter: GridConverter = {
    toLatLon: (reference) => {
      calls.push(reference);
      return known[reference] ?? null;
    }
  };
  return { converter, calls };
};

export const createTempDir = async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "mgrs-csv-"));
  return {
    dir,
    file: async (name: string, contents: string | Buffer) => {
      const filePath = path.join(dir, name);
      await writeFile(filePath, contents);
      return filePath;
    },
    cleanup: () => rm(dir, { recursive: true, force: true })
  };
};
