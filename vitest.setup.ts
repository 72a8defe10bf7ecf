/**
 * Vitest Global Setup
 *
 * Resets the config cache so that vi.stubEnv() calls made at file level or
 * inside beforeAll/beforeEach are picked up on the next config access.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
