import type { FheScheme, KeyPair, SchemeTypes } from "./types";
import { ConfigurationError, toError } from "../utils/errors";

/**
 * Produces bound (client key, server key) pairs under the scheme's single
 * fixed parameter configuration.
 */
export class KeyPairGenerator<T extends SchemeTypes> {
  constructor(private readonly scheme: FheScheme<T>) {}

  /**
   * Generate a fresh pair. The server key is derived from the new client
   * key here and nowhere else.
   *
   * @throws ConfigurationError when the parameter set or keys cannot be built
   */
  generate(): KeyPair<T> {
    try {
      const clientKey = this.scheme.generateClientKey();
      const serverKey = this.scheme.deriveServerKey(clientKey);
      return Object.freeze({ clientKey, serverKey });
    } catch (error) {
      const cause = toError(error);
      throw new ConfigurationError(
        `Failed to generate ${this.scheme.name} key pair: ${cause.message}`,
        { cause, context: { scheme: this.scheme.name } }
      );
    }
  }
}
