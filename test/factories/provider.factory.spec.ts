import { detectEndpointKind } from "../../src/factories/provider.factory";

describe("detectEndpointKind", () => {
  it.each([
    ["http://localhost:8545", "http"],
    ["https://rpc.example.org", "http"],
    ["ws://localhost:8546", "ws"],
    ["wss://rpc.example.org/ws", "ws"],
    ["/var/lib/geth/geth.ipc", "ipc"],
  ])("%s is an %s endpoint", (url, kind) => {
    expect(detectEndpointKind(url)).toBe(kind);
  });
});
