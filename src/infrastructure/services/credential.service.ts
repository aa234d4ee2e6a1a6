import { createInterface } from "node:readline";
import { ICredentialService } from "../../core/domain/services/credential.service.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { FernetSecretService } from "./fernet-secret.service.js";

export const SECRET_PROMPT =
  "Please enter your OpenClash API secret (leave empty if none), and press Enter: ";

export interface CredentialServiceOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
}

/**
 * OPENCLASH_API_SECRET (or its Fernet-encrypted form) skips the prompt;
 * otherwise one line is read from the terminal. An empty answer is a valid
 * "no secret" choice.
 */
export class CredentialService implements ICredentialService {
  constructor(
    private logger: ILogger,
    private options: CredentialServiceOptions = {},
  ) {}

  async acquire(): Promise<string> {
    const env = this.options.env ?? process.env;
    if (env === process.env) {
      for (const name of FernetSecretService.loadSecrets()) {
        this.logger.error(`Could not decrypt ${name}; ignoring it.`);
      }
    }

    const fromEnv = env.OPENCLASH_API_SECRET;
    if (fromEnv !== undefined) {
      this.logger.info("Using API secret from OPENCLASH_API_SECRET.");
      return fromEnv.trim();
    }
    return this.prompt();
  }

  private prompt(): Promise<string> {
    return new Promise((resolve) => {
      const rl = createInterface({
        input: this.options.input ?? process.stdin,
        output: this.options.output ?? process.stdout,
      });
      let answered = false;
      rl.question(SECRET_PROMPT, (answer) => {
        answered = true;
        rl.close();
        resolve(answer.trim());
      });
      // EOF before a newline counts as an empty answer.
      rl.once("close", () => {
        if (!answered) resolve("");
      });
    });
  }
}
