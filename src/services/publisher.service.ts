import { createClient } from "redis";
import { Logger } from "winston";
import {
  IndexMessage,
  RedisConnectionOptions,
  RedisPublisher,
  RedisPublisherStatus,
} from "../utils/types/redis.types";

type RedisClient = ReturnType<typeof createClient>;

/**
 * Publishes index notifications on a Redis pub/sub channel.
 */
export default class RedisPublisherImpl implements RedisPublisher {
  private client: RedisClient;
  private connected: boolean = false;
  private messagesPublished: number = 0;
  private lastMessageTimestamp?: Date;
  private errors: number = 0;

  /**
   * @param host - Redis server host
   * @param port - Redis server port
   * @param channel - Channel to publish messages to
   * @param logger - Logger from the sync context
   * @param options - Credentials and TLS
   */
  constructor(
    private host: string,
    private port: number,
    private channel: string,
    private logger: Logger,
    options: RedisConnectionOptions = {}
  ) {
    this.client = createClient({
      socket: options.tls ? { host, port, tls: true } : { host, port },
      password: options.password,
      username: options.username,
    });

    this.client.on("ready", () => {
      this.logger.info("Redis publisher connected and ready", {
        host,
        port,
        channel,
      });
      this.connected = true;
    });

    this.client.on("end", () => {
      this.logger.warn("Redis publisher connection ended", { host, port, channel });
      this.connected = false;
    });

    this.client.on("error", (error: Error) => {
      this.logger.error("Redis publisher error", { host, port, channel, error });
      this.errors++;
      this.connected = false;
    });
  }

  async connect(): Promise<void> {
    if (!this.client.isOpen) {
      await this.client.connect();
    }
    this.logger.info("Redis publisher connected successfully", {
      host: this.host,
      port: this.port,
      channel: this.channel,
    });
  }

  async disconnect(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
    this.connected = false;
    this.logger.info("Redis publisher disconnected", {
      host: this.host,
      port: this.port,
    });
  }

  async publish(message: IndexMessage): Promise<void> {
    if (!this.isConnected()) {
      this.logger.warn("Publishing while disconnected, reconnecting", {
        host: this.host,
        port: this.port,
      });
      await this.connect();
    }

    try {
      await this.client.publish(this.channel, JSON.stringify(message));
      this.messagesPublished++;
      this.lastMessageTimestamp = new Date();

      this.logger.debug("Message published", {
        channel: this.channel,
        type: message.type,
      });
    } catch (error) {
      this.errors++;
      throw error;
    }
  }

  isConnected(): boolean {
    return this.connected && this.client.isOpen;
  }

  getStatus(): RedisPublisherStatus {
    return {
      isConnected: this.isConnected(),
      messagesPublished: this.messagesPublished,
      lastMessageTimestamp: this.lastMessageTimestamp,
      errors: this.errors,
    };
  }
}
