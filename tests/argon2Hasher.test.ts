import { verify } from "argon2";
import { Argon2PasswordHasher } from "../src/infra/security/argon2Hasher";

test("hashes passwords with argon2id and a fresh salt", async () => {
  const hasher = new Argon2PasswordHasher();

  const first = await hasher.hash("test-secret");
  const second = await hasher.hash("test-secret");

  expect(first.startsWith("$argon2id$")).toBe(true);
  expect(first).not.toBe(second);
  await expect(verify(first, "test-secret")).resolves.toBe(true);
  await expect(verify(first, "other-secret")).resolves.toBe(false);
});
