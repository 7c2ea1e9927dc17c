import { expect } from "chai";
import {
  KeyringError,
  KeyringErrorCode,
  ConfigurationError,
  StorageWriteError,
  StorageReadError,
  MalformedEncodingError,
  DeserializationError,
  SerializationError,
  EncryptionError,
  ValidationError,
  ContractError,
  NetworkError,
  parseContractError,
  isKeyringError,
  toError,
} from "../src/utils/errors";

describe("errors", () => {
  // ═══════════════════════════════════════════════════════════════
  // KeyringError base class
  // ═══════════════════════════════════════════════════════════════
  describe("KeyringError", () => {
    it("should set defaults correctly", () => {
      const err = new KeyringError("test");
      expect(err.message).to.equal("test");
      expect(err.code).to.equal(KeyringErrorCode.UNKNOWN_ERROR);
      expect(err.retryable).to.be.false;
      expect(err.timestamp).to.be.instanceOf(Date);
      expect(err.name).to.equal("KeyringError");
      expect(err.context).to.deep.equal({});
    });

    it("should accept custom code and options", () => {
      const cause = new Error("root");
      const err = new KeyringError("fail", KeyringErrorCode.NETWORK_ERROR, {
        cause,
        retryable: true,
        suggestedAction: "retry",
        context: { key: "val" },
      });
      expect(err.code).to.equal(KeyringErrorCode.NETWORK_ERROR);
      expect(err.retryable).to.be.true;
      expect(err.cause).to.equal(cause);
      expect(err.suggestedAction).to.equal("retry");
      expect(err.context.key).to.equal("val");
    });

    it("toJSON() should include code name and cause message", () => {
      const err = new KeyringError("j", KeyringErrorCode.INVALID_INPUT, { cause: new Error("inner") });
      const json = err.toJSON();
      expect(json).to.have.property("name", "KeyringError");
      expect(json).to.have.property("code", KeyringErrorCode.INVALID_INPUT);
      expect(json).to.have.property("codeName", "INVALID_INPUT");
      expect(json).to.have.property("cause", "inner");
      expect(json).to.have.property("timestamp");
    });

    it("isType() should match code", () => {
      const err = new KeyringError("x", KeyringErrorCode.MALFORMED_ENCODING);
      expect(err.isType(KeyringErrorCode.MALFORMED_ENCODING)).to.be.true;
      expect(err.isType(KeyringErrorCode.NETWORK_ERROR)).to.be.false;
    });

    it("isCategory() should match code ranges", () => {
      expect(new ValidationError("bad").isCategory("validation")).to.be.true;
      expect(new ValidationError("bad").isCategory("contract")).to.be.false;
      expect(new NetworkError("down").isCategory("general")).to.be.true;
      expect(new DeserializationError("clientKey").isCategory("crypto")).to.be.true;
      expect(new StorageReadError("/k").isCategory("storage")).to.be.true;
    });

    it("isKeyringError() should narrow subclasses only", () => {
      expect(isKeyringError(new StorageWriteError("/k"))).to.be.true;
      expect(isKeyringError(new Error("plain"))).to.be.false;
      expect(isKeyringError("string")).to.be.false;
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Key lifecycle errors
  // ═══════════════════════════════════════════════════════════════
  describe("key lifecycle errors", () => {
    it("ConfigurationError is fatal", () => {
      const err = new ConfigurationError("no parameters", { context: { scheme: "tfhe" } });
      expect(err.name).to.equal("ConfigurationError");
      expect(err.code).to.equal(KeyringErrorCode.SCHEME_CONFIGURATION_FAILED);
      expect(err.retryable).to.be.false;
      expect(err.context.scheme).to.equal("tfhe");
    });

    it("StorageWriteError carries the path and is retryable", () => {
      const err = new StorageWriteError("/keys/fheClientKey.bin", new Error("EACCES"));
      expect(err.message).to.equal("Failed to write key material to /keys/fheClientKey.bin: EACCES");
      expect(err.path).to.equal("/keys/fheClientKey.bin");
      expect(err.code).to.equal(KeyringErrorCode.STORAGE_WRITE_FAILED);
      expect(err.retryable).to.be.true;
    });

    it("StorageReadError without a cause", () => {
      const err = new StorageReadError("/keys/missing.bin");
      expect(err.message).to.equal("Failed to read key material from /keys/missing.bin");
      expect(err.context).to.deep.equal({ path: "/keys/missing.bin" });
    });

    it("MalformedEncodingError.withContext() keeps the reason", () => {
      const err = new MalformedEncodingError("odd number of hex characters (3)", { length: 3 });
      const located = err.withContext({ path: "/keys/k.bin" });
      expect(located.message).to.equal("Malformed hex encoding: odd number of hex characters (3)");
      expect(located.context).to.deep.equal({
        length: 3,
        reason: "odd number of hex characters (3)",
        path: "/keys/k.bin",
      });
    });

    it("DeserializationError names the expected kind", () => {
      const err = new DeserializationError("serverKey", new Error("type mismatch"));
      expect(err.message).to.equal("Bytes are not a valid serverKey: type mismatch");
      expect(err.expectedKind).to.equal("serverKey");
      expect(err.code).to.equal(KeyringErrorCode.DESERIALIZATION_FAILED);
    });

    it("SerializationError names the kind", () => {
      const err = new SerializationError("ciphertext32");
      expect(err.message).to.equal("Failed to serialize ciphertext32");
      expect(err.kind).to.equal("ciphertext32");
    });

    it("EncryptionError code depends on whether the backend failed", () => {
      const range = new EncryptionError("too big", { width: 8, value: 256 });
      expect(range.code).to.equal(KeyringErrorCode.VALUE_OUT_OF_RANGE);
      expect(range.context).to.deep.equal({ width: 8, value: "256" });

      const backend = new EncryptionError("refused", { width: 32, value: 1, cause: new Error("wasm") });
      expect(backend.code).to.equal(KeyringErrorCode.ENCRYPTION_FAILED);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Ledger errors
  // ═══════════════════════════════════════════════════════════════
  describe("ledger errors", () => {
    it("ContractError", () => {
      const err = new ContractError("reverted", KeyringErrorCode.TRANSACTION_REVERTED, {
        transactionHash: "0x123",
        revertReason: "OwnableUnauthorizedAccount",
      });
      expect(err.name).to.equal("ContractError");
      expect(err.transactionHash).to.equal("0x123");
      expect(err.revertReason).to.equal("OwnableUnauthorizedAccount");
      expect(err.retryable).to.be.false;
    });

    it("ContractError retryable for NONCE_TOO_LOW", () => {
      expect(new ContractError("nonce", KeyringErrorCode.NONCE_TOO_LOW).retryable).to.be.true;
    });

    it("NetworkError", () => {
      const err = new NetworkError("timeout", { endpoint: "http://rpc", statusCode: 503 });
      expect(err.name).to.equal("NetworkError");
      expect(err.endpoint).to.equal("http://rpc");
      expect(err.statusCode).to.equal(503);
      expect(err.retryable).to.be.true;
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // parseContractError
  // ═══════════════════════════════════════════════════════════════
  describe("parseContractError", () => {
    it("should map ownership reverts", () => {
      const err = parseContractError(
        new Error("execution reverted: OwnableUnauthorizedAccount(0x9999999999999999999999999999999999999999)")
      );
      expect(err.code).to.equal(KeyringErrorCode.TRANSACTION_REVERTED);
      expect(err.message).to.equal("Signer is not allowed to modify the whitelist");
      expect(err.revertReason).to.equal("OwnableUnauthorizedAccount");
    });

    it("should map legacy Ownable message", () => {
      const err = parseContractError(new Error("Ownable: caller is not the owner"));
      expect(err.code).to.equal(KeyringErrorCode.TRANSACTION_REVERTED);
    });

    it("should map insufficient funds", () => {
      const err = parseContractError(new Error("insufficient funds for gas * price + value"));
      expect(err.code).to.equal(KeyringErrorCode.INSUFFICIENT_FUNDS);
    });

    it("should map nonce too low", () => {
      const err = parseContractError(new Error("nonce too low"));
      expect(err.code).to.equal(KeyringErrorCode.NONCE_TOO_LOW);
      expect(err.retryable).to.be.true;
    });

    it("should map replacement underpriced", () => {
      const err = parseContractError(new Error("replacement transaction underpriced"));
      expect(err.code).to.equal(KeyringErrorCode.REPLACEMENT_UNDERPRICED);
    });

    it("should keep the message of other reverts", () => {
      const err = parseContractError(new Error("execution reverted: Paused"));
      expect(err.code).to.equal(KeyringErrorCode.TRANSACTION_REVERTED);
      expect(err.message).to.equal("execution reverted: Paused");
    });

    it("should default to CONTRACT_CALL_FAILED", () => {
      const cause = new Error("something else");
      const err = parseContractError(cause);
      expect(err.code).to.equal(KeyringErrorCode.CONTRACT_CALL_FAILED);
      expect(err.cause).to.equal(cause);
    });
  });

  describe("toError", () => {
    it("should pass errors through and wrap other values", () => {
      const err = new Error("x");
      expect(toError(err)).to.equal(err);
      expect(toError("boom").message).to.equal("boom");
      expect(toError(42).message).to.equal("42");
    });
  });
});
