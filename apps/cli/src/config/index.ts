import { getConfigFromCli } from "./arg-parser.js";
import type { BlatteCliConfig } from "./types.js";

export type { BlatteCliConfig };

let config: BlatteCliConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
