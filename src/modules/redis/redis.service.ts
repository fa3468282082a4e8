import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { createClient } from 'redis';
import redisConfig from '../../config/redis.config';
import { describeError } from '../../common/utils/error.util';

function buildClient(host: string, port: number) {
    return createClient({
        socket: {
            host,
            port,
            reconnectStrategy: (retries) => Math.min(retries * 50, 500),
        },
    });
}

type RedisClient = ReturnType<typeof buildClient>;

/**
 * JSON key/value access to Redis with a default TTL. When the cache is
 * disabled no connection is made and every read misses.
 */
@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(RedisService.name);
    private client?: RedisClient;
    private isConnected = false;

    constructor(@Inject(redisConfig.KEY) private readonly config: ConfigType<typeof redisConfig>) { }

    async onModuleInit() {
        if (!this.config.enabled) {
            this.logger.log('Redis cache disabled');
            return;
        }
        await this.connect();
    }

    async onModuleDestroy() {
        await this.disconnect();
    }

    private async connect() {
        try {
            const client = buildClient(this.config.host, this.config.port);

            client.on('error', (err: unknown) => {
                this.logger.error(`Redis client error: ${describeError(err)}`);
            });

            await client.connect();
            this.client = client;
            this.isConnected = true;
            this.logger.log('✅ Redis connected successfully');
        } catch (error) {
            this.logger.error(`Failed to connect to Redis: ${describeError(error)}`);
            throw error;
        }
    }

    private async disconnect() {
        if (this.client && this.isConnected) {
            await this.client.quit();
            this.isConnected = false;
            this.logger.log('Redis disconnected');
        }
    }

    /**
     * Parsed value stored under `key`, or null on a miss. Read errors count
     * as misses.
     */
    async getJson(key: string): Promise<unknown> {
        if (!this.client || !this.isConnected) {
            return null;
        }
        try {
            const data = await this.client.get(key);
            return data === null ? null : JSON.parse(data);
        } catch (error) {
            this.logger.warn(`Failed to read cache key ${key}: ${describeError(error)}`);
            return null;
        }
    }

    async setJson(key: string, value: unknown, ttlSeconds: number = this.config.ttlSeconds): Promise<void> {
        if (!this.client || !this.isConnected) {
            return;
        }
        await this.client.setEx(key, ttlSeconds, JSON.stringify(value));
        this.logger.debug(`💾 Cached ${key}`);
    }

    isReady(): boolean {
        return this.isConnected;
    }
}
