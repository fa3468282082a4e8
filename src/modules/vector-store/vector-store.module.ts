import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import vectorStoreConfig from '../../config/vector-store.config';
import { InMemoryVectorStore } from './in-memory-vector-store';
import { MilvusService } from './milvus.service';
import { VectorStore } from './vector-store';

/**
 * Vector Store Module - Milvus in deployments, in-process store otherwise
 */
@Module({
    providers: [
        {
            provide: VectorStore,
            inject: [vectorStoreConfig.KEY],
            useFactory: (config: ConfigType<typeof vectorStoreConfig>): VectorStore =>
                config.driver === 'milvus'
                    ? new MilvusService(config)
                    : new InMemoryVectorStore(config.collection),
        },
    ],
    exports: [VectorStore],
})
export class VectorStoreModule { }
