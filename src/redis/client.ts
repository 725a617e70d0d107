import { Redis } from "ioredis";
import type { Logger } from "../middleware/requestLogger";

let redisSingleton: Redis | null = null;

export function getRedis(url: string, logger: Logger): Redis {
  if (redisSingleton) return redisSingleton;
  redisSingleton = new Redis(url, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    commandTimeout: 2000,
    connectTimeout: 5000,
  });
  redisSingleton.on("error", (e: Error) => logger.error({ err: e.message }, "[redis] error"));
  redisSingleton.on("connect", () => logger.info("[redis] connected"));
  return redisSingleton;
}

export async function closeRedis(logger: Logger) {
  if (!redisSingleton) return;
  const client = redisSingleton;
  redisSingleton = null;
  try {
    await client.quit();
  } catch (e) {
    logger.warn({ err: e }, "[redis] quit failed, disconnecting");
    client.disconnect();
  }
}
