import { tokenize } from '../../utils/textNormalizer';
import { l2Normalize } from '../../utils/vectorMath';
import { EmbeddingsClient } from './embeddings.types';

const DIMS = 384;
const SEED = 0x9747b28c;
const M = 0x5bd1e995;

/**
 * Offline bag-of-words embedding: every token is hashed (MurmurHash2) into
 * one of 384 buckets, then the counts are L2-normalised. Deterministic.
 */
export class HashingEmbeddingsClient implements EmbeddingsClient {
    readonly name = 'SIMPLE';
    readonly dimensions = DIMS;

    async embed(text: string): Promise<number[]> {
        return this.embedSync(text);
    }

    embedSync(text: string): number[] {
        const vector = new Array<number>(DIMS).fill(0);
        for (const token of tokenize(text)) {
            vector[bucketOf(token)] += 1;
        }
        return l2Normalize(vector);
    }
}

export function bucketOf(token: string): number {
    return Math.abs(murmur2(Buffer.from(token, 'utf8'))) % DIMS;
}

export function murmur2(data: Uint8Array, seed = SEED): number {
    let h = seed | 0;
    let len = data.length;
    let i = 0;

    while (len >= 4) {
        let k = data[i] | (data[i + 1] << 8) | (data[i + 2] << 16) | (data[i + 3] << 24);
        k = Math.imul(k, M);
        k ^= k >>> 24;
        k = Math.imul(k, M);
        h = Math.imul(h, M) ^ k;
        i += 4;
        len -= 4;
    }

    // tail bytes
    if (len >= 3) h ^= data[i + 2] << 16;
    if (len >= 2) h ^= data[i + 1] << 8;
    if (len >= 1) {
        h ^= data[i];
        h = Math.imul(h, M);
    }

    h ^= h >>> 13;
    h = Math.imul(h, M);
    h ^= h >>> 15;
    return h | 0;
}
