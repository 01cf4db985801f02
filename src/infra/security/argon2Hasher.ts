import { hash } from "argon2";
import type { PasswordHasher } from "../../modules/clients/service";

export class Argon2PasswordHasher implements PasswordHasher {
  hash(plain: string): Promise<string> {
    return hash(plain);
  }
}
