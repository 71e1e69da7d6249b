import "dotenv/config";
import { setConfig } from "../src/index.js";

setConfig({
  showType: process.env.TYPED_INPUT_SHOW_TYPE !== undefined ? process.env.TYPED_INPUT_SHOW_TYPE === "true" : undefined,
  maxAttempts: process.env.TYPED_INPUT_MAX_ATTEMPTS ? parseInt(process.env.TYPED_INPUT_MAX_ATTEMPTS, 10) : undefined,
  silent: process.env.TYPED_INPUT_SILENT !== undefined ? process.env.TYPED_INPUT_SILENT === "true" : undefined,
});
