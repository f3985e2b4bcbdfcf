import {
  createMergeTreeTests,
  createObjectStoreTests,
  createUpdateTreeTests,
  type ObjectStoreTestContext,
} from "@treesmith/testing";

import { MemoryObjectStore } from "../src/index.js";

async function createMemoryContext(): Promise<ObjectStoreTestContext> {
  return { store: new MemoryObjectStore() };
}

createObjectStoreTests("Memory", createMemoryContext);
createUpdateTreeTests("Memory", createMemoryContext);
createMergeTreeTests("Memory", createMemoryContext);
