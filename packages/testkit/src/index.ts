export { createTempDir, removeDir, withTempDir, withTempDatabase } from "./fs.js";
