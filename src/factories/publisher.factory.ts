import { Logger } from "winston";
import { RedisPublisher } from "../utils/types/redis.types";
import { RedisConfig } from "../utils/types/config.types";
import RedisPublisherImpl from "../services/publisher.service";

export class RedisPublisherFactory {
  /**
   * Creates a Redis publisher, or nothing when notifications are not configured.
   */
  static createPublisher(
    config: RedisConfig | undefined,
    logger: Logger
  ): RedisPublisher | undefined {
    if (!config) {
      logger.info("Redis notifications disabled");
      return undefined;
    }

    logger.info("Creating Redis publisher", {
      host: config.host,
      port: config.port,
      channel: config.channel,
    });
    return new RedisPublisherImpl(
      config.host,
      config.port,
      config.channel,
      logger,
      { username: config.username, password: config.password, tls: config.tls }
    );
  }
}

export default RedisPublisherFactory;
