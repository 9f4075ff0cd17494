import { Layer } from "effect";
import type { Config } from "../config.ts";
import { LibraryStoreLive } from "../store/library-store.ts";
import { LiveFileSystemService, LiveLoggerService, makeConfigLayer } from "./services.ts";

/** Everything one library instance needs, built once per process. */
export const makeLiveLayer = (config: Config) => {
  const base = Layer.mergeAll(makeConfigLayer(config), LiveLoggerService, LiveFileSystemService);
  return LibraryStoreLive.pipe(Layer.provideMerge(base));
};
