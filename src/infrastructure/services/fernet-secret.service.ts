import { Fernet } from "fernet-nodejs";

export class FernetSecretService {
  private static decryptionAttempted = false;
  private static readonly ENCRYPTED_VARS: [string, string][] = [
    ["OPENCLASH_API_SECRET_ENCRYPTED", "OPENCLASH_API_SECRET"],
  ];

  /**
   * If FERNET_KEY is set, decrypt the *_ENCRYPTED env vars into their plain
   * counterparts. Returns the names of the vars that could not be decrypted.
   */
  static loadSecrets(): string[] {
    if (this.decryptionAttempted) return [];
    this.decryptionAttempted = true;

    const key = process.env.FERNET_KEY?.trim();
    if (!key) return [];

    const failed: string[] = [];
    let fernet: Fernet;
    try {
      fernet = new Fernet(key);
    } catch {
      return this.ENCRYPTED_VARS.filter(([encKey]) =>
        process.env[encKey]?.trim(),
      ).map(([encKey]) => encKey);
    }

    for (const [encKey, plainKey] of this.ENCRYPTED_VARS) {
      const encrypted = process.env[encKey]?.trim();
      if (!encrypted) continue;
      try {
        const decrypted = fernet.decrypt(encrypted);
        process.env[plainKey] =
          typeof decrypted === "string" ? decrypted : String(decrypted);
      } catch {
        failed.push(encKey);
      }
    }
    return failed;
  }
}
