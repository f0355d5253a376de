export { afterEach, assert, beforeEach, describe, test } from "./nodeTest.js";
export { captureLogs, type CapturedLogEvent, type LogCapture } from "./logs.js";
export { withTempDir } from "./tempDir.js";
