export { SqliteEntityStore } from "./sqlite-store.js";
