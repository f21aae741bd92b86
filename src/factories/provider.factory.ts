import {
  FetchRequest,
  IpcSocketProvider,
  JsonRpcApiProvider,
  JsonRpcProvider,
  WebSocketProvider,
} from "ethers";
import { Logger } from "winston";
import EthersChainReader from "../providers/ethers-chain.provider";
import ResilientChainReader from "../providers/resilient-chain.provider";
import { RpcConfig } from "../utils/types/config.types";

export type EndpointKind = "http" | "ws" | "ipc";

export function detectEndpointKind(url: string): EndpointKind {
  if (url.startsWith("http")) {
    return "http";
  }
  if (url.startsWith("ws")) {
    return "ws";
  }
  return "ipc";
}

export class BlockchainProviderFactory {
  /**
   * Creates an ethers provider for the node endpoint.
   * @param url - http(s) URL, ws(s) URL, or a filesystem path to the node's IPC socket
   * @param timeoutMs - request timeout applied to HTTP endpoints
   */
  static createProvider(url: string, timeoutMs: number): JsonRpcApiProvider {
    switch (detectEndpointKind(url)) {
      case "http": {
        const request = new FetchRequest(url);
        request.timeout = timeoutMs;
        return new JsonRpcProvider(request, undefined, { staticNetwork: true });
      }
      case "ws":
        return new WebSocketProvider(url);
      case "ipc":
        return new IpcSocketProvider(url);
    }
  }

  static createChainReader(
    url: string,
    rpc: RpcConfig,
    logger: Logger
  ): { reader: ResilientChainReader; base: EthersChainReader } {
    logger.info("Creating chain reader", {
      endpoint: detectEndpointKind(url),
      timeoutMs: rpc.timeoutMs,
      maxRetries: rpc.maxRetries,
    });

    const base = new EthersChainReader(
      BlockchainProviderFactory.createProvider(url, rpc.timeoutMs),
      logger
    );
    const reader = new ResilientChainReader(
      base,
      {
        timeoutMs: rpc.timeoutMs,
        maxRetries: rpc.maxRetries,
        baseDelayMs: rpc.retryBaseDelayMs,
        maxDelayMs: rpc.retryMaxDelayMs,
        backoffMultiplier: 2,
      },
      logger
    );
    return { reader, base };
  }
}

export default BlockchainProviderFactory;
