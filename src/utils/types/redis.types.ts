export interface BlockIndexedMessage {
  type: "block";
  blockNumber: number;
  blockHash: string;
  timestamp: number;
  records: string[];
}

export interface ReorgMessage {
  type: "reorg";
  fromBlock: number;
  toBlock: number;
}

export type IndexMessage = BlockIndexedMessage | ReorgMessage;

/** Receives a message after the store has committed the change it describes. */
export interface IndexNotifier {
  publish(message: IndexMessage): Promise<void>;
}

export interface RedisPublisher extends IndexNotifier {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  getStatus(): RedisPublisherStatus;
}

export interface RedisPublisherStatus {
  isConnected: boolean;
  messagesPublished: number;
  lastMessageTimestamp?: Date;
  errors: number;
}

export interface RedisConnectionOptions {
  password?: string;
  username?: string;
  tls?: boolean;
}
