export { SqliteContactStore } from "./sqlite-store.js";
export { contacts } from "./schema.js";
export type { ContactRow, NewContactRow } from "./schema.js";
