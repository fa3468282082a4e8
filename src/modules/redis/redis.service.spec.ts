import { RedisService } from './redis.service';

const mockStore = new Map<string, string>();
const mockClient = {
    on: jest.fn(),
    connect: jest.fn(async () => undefined),
    quit: jest.fn(async () => 'OK'),
    get: jest.fn(async (key: string) => mockStore.get(key) ?? null),
    setEx: jest.fn(async (key: string, _ttl: number, value: string) => {
        mockStore.set(key, value);
        return 'OK';
    }),
};
const mockCreateClient = jest.fn(() => mockClient);

jest.mock('redis', () => ({
    createClient: () => mockCreateClient(),
}));

const config = { enabled: true, host: 'localhost', port: 6379, ttlSeconds: 60 };

describe('RedisService', () => {
    beforeEach(() => {
        mockStore.clear();
        jest.clearAllMocks();
    });

    it('stores JSON values with the default TTL', async () => {
        const service = new RedisService(config);
        await service.onModuleInit();

        await service.setJson('embedding:abc', [0.6, 0.8]);

        expect(mockClient.setEx).toHaveBeenCalledWith('embedding:abc', 60, '[0.6,0.8]');
        await expect(service.getJson('embedding:abc')).resolves.toEqual([0.6, 0.8]);
    });

    it('misses on unknown keys', async () => {
        const service = new RedisService(config);
        await service.onModuleInit();

        await expect(service.getJson('embedding:missing')).resolves.toBeNull();
    });

    it('treats unreadable values as misses', async () => {
        const service = new RedisService(config);
        await service.onModuleInit();
        mockStore.set('embedding:broken', '{not json');

        await expect(service.getJson('embedding:broken')).resolves.toBeNull();
    });

    it('never connects when disabled', async () => {
        const service = new RedisService({ ...config, enabled: false });
        await service.onModuleInit();

        await service.setJson('embedding:abc', [1]);

        expect(mockCreateClient).not.toHaveBeenCalled();
        expect(service.isReady()).toBe(false);
        await expect(service.getJson('embedding:abc')).resolves.toBeNull();
    });

    it('quits the client on shutdown', async () => {
        const service = new RedisService(config);
        await service.onModuleInit();

        await service.onModuleDestroy();

        expect(mockClient.quit).toHaveBeenCalledTimes(1);
        expect(service.isReady()).toBe(false);
    });
});
