import TransactionDecoder, {
  parseTokenTransfer,
} from "../../src/services/transaction-decoder.service";
import { RawTransaction } from "../../src/utils/types/chain.types";
import { ALICE, BOB, TOKEN, transferInput, txHash } from "../support/chain";
import { silentLogger } from "../support/runtime";

const block = { number: 200, timestamp: 1_700_000_000 };
const receipt = { gasUsed: 21000n, status: true };

function tx(overrides: Partial<RawTransaction> = {}): RawTransaction {
  return {
    hash: txHash(200, 0),
    from: ALICE,
    to: BOB,
    value: 1n,
    gasPrice: 2n,
    input: "0x",
    blockNumber: 200,
    ...overrides,
  };
}

describe("parseTokenTransfer", () => {
  it("extracts the recipient and the amount slot", () => {
    expect(parseTokenTransfer(transferInput(BOB, "64"))).toEqual({
      contractTo: BOB,
      contractValue: "64".padStart(64, "0"),
      paddingValid: true,
    });
  });

  it("lowercases mixed-case calldata", () => {
    const input = `0xA9059CBB${"0".repeat(24)}ABCDEF0000000000000000000000000000ABCDEF${"FF".padStart(64, "0")}`;

    expect(parseTokenTransfer(input)).toEqual({
      contractTo: "0xabcdef0000000000000000000000000000abcdef",
      contractValue: "ff".padStart(64, "0"),
      paddingValid: true,
    });
  });

  it("reads slots by position when extra data follows the arguments", () => {
    const input = `${transferInput(BOB, "0a")}deadbeef`;

    expect(parseTokenTransfer(input)?.contractValue).toBe("0a".padStart(64, "0"));
  });

  it("flags an address slot without zero padding", () => {
    const input = `0xa9059cbb${"f".repeat(24)}${BOB.slice(2)}${"1".padStart(64, "0")}`;

    expect(parseTokenTransfer(input)).toEqual({
      contractTo: BOB,
      contractValue: "1".padStart(64, "0"),
      paddingValid: false,
    });
  });

  it("returns null for other selectors and truncated arguments", () => {
    expect(parseTokenTransfer("0x095ea7b3")).toBeNull();
    expect(parseTokenTransfer("0x")).toBeNull();
    expect(parseTokenTransfer(`0xa9059cbb${"0".repeat(64)}`)).toBeNull();
  });
});

describe("TransactionDecoder", () => {
  const logger = silentLogger();
  const decoder = new TransactionDecoder(logger);

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("builds a record from a value transfer", () => {
    expect(decoder.decode(block, tx(), receipt)).toEqual({
      kind: "record",
      record: {
        time: new Date("2023-11-14T22:13:20.000Z"),
        fromAddr: ALICE,
        toAddr: BOB,
        value: "1",
        gas: "21000",
        gasPrice: "2",
        block: 200,
        txHash: txHash(200, 0),
        contractTo: "",
        contractValue: "",
        status: true,
      },
    });
  });

  it("skips zero-value transactions that are not token transfers", () => {
    expect(decoder.decode(block, tx({ value: 0n, input: "0x095ea7b3" }), receipt)).toEqual({
      kind: "skip",
      reason: "zero-value",
      detail: "zero value and not a token transfer call",
    });
  });

  it("keeps zero-value token transfers with the decoded call", () => {
    const result = decoder.decode(
      block,
      tx({ to: TOKEN, value: 0n, input: transferInput(BOB, "10") }),
      receipt
    );

    expect(result.kind === "record" ? result.record : null).toMatchObject({
      toAddr: TOKEN,
      value: "0",
      contractTo: BOB,
      contractValue: "10".padStart(64, "0"),
    });
  });

  it("warns and drops a zero-value call whose transfer arguments are truncated", () => {
    const warn = jest.spyOn(logger, "warn");

    const result = decoder.decode(
      block,
      tx({ value: 0n, input: "0xa9059cbb0000" }),
      receipt
    );

    expect(result).toMatchObject({ kind: "skip", reason: "zero-value" });
    expect(warn).toHaveBeenCalledWith(
      "Transfer selector with truncated arguments",
      expect.objectContaining({ txHash: txHash(200, 0) })
    );
  });

  it("warns about an unpadded address slot and still decodes the call", () => {
    const warn = jest.spyOn(logger, "warn");
    const input = `0xa9059cbb${"f".repeat(24)}${BOB.slice(2)}${"2a".padStart(64, "0")}`;

    const result = decoder.decode(block, tx({ to: TOKEN, value: 0n, input }), receipt);

    expect(warn).toHaveBeenCalledWith(
      "Address argument does not have 24 leading zeros",
      { txHash: txHash(200, 0), padding: "f".repeat(24) }
    );
    expect(result.kind === "record" ? result.record : null).toMatchObject({
      contractTo: BOB,
      contractValue: "2a".padStart(64, "0"),
    });
  });

  it("skips transactions without a sender and logs the error", () => {
    const error = jest.spyOn(logger, "error");

    expect(decoder.decode(block, tx({ from: undefined }), receipt)).toEqual({
      kind: "skip",
      reason: "missing-field",
      detail: "from",
    });
    expect(error).toHaveBeenCalledWith(
      "Cannot get 'from' item from transaction",
      expect.objectContaining({ blockNumber: 200 })
    );
  });

  it("skips transactions without a recipient field", () => {
    expect(decoder.decode(block, tx({ to: undefined }), receipt)).toEqual({
      kind: "skip",
      reason: "missing-field",
      detail: "to",
    });
  });

  it("records contract creations with a null recipient", () => {
    const result = decoder.decode(block, tx({ to: null }), receipt);

    expect(result.kind === "record" ? result.record.toAddr : "missing").toBeNull();
  });

  it("defaults a missing gas price to zero and keeps an unknown status", () => {
    const result = decoder.decode(
      block,
      tx({ gasPrice: null }),
      { gasUsed: 50000n, status: null }
    );

    expect(result.kind === "record" ? result.record : null).toMatchObject({
      gas: "50000",
      gasPrice: "0",
      status: null,
    });
  });
});
