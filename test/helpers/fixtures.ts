// Test data factories for creating test objects.

import type { User } from "../../src/storage/types.js";
import { EXTERNAL_ID } from "./constants.js";

// Create a test user with sensible defaults.
export function createTestUser(overrides: Partial<User> = {}): User {
  return {
    username: "alice",
    externalId: EXTERNAL_ID,
    fullName: "Alice Example",
    email: "alice@example.com",
    groups: ["staff"],
    ...overrides,
  };
}
