import { AttachedType, typeName } from '../decorators';
import { CodecUnavailableError } from '../errors';
import { Codec, isJsonCodec } from './Codec';
import { ListCodec } from './ListCodec';
import { CodecStrategy, DEFAULT_STRATEGIES } from './strategies';

/**
 * An override forces a type onto one strategy, or hands over a ready-made codec.
 */
export type CodecOverride = CodecStrategy | Codec;

export interface CodecRegistryOptions {
    strategies?: readonly CodecStrategy[];
    overrides?: ReadonlyArray<readonly [AttachedType, CodecOverride]> | ReadonlyMap<AttachedType, CodecOverride>;
}

function isCodecStrategy(override: CodecOverride): override is CodecStrategy {
    return 'supports' in override && 'create' in override;
}

/**
 * CodecRegistry - Resolves the codec of each attached type, once.
 *
 * Resolution order:
 * 1. an override registered for the type
 * 2. the first strategy that supports the type (hooks, schema, permissive by default)
 *
 * Resolution happens when a route is registered. A type nothing supports raises
 * CodecUnavailableError right there, so no request can ever reach a type without a codec.
 */
export class CodecRegistry {
    private readonly strategies: readonly CodecStrategy[];
    private readonly overrides = new Map<AttachedType, CodecOverride>();
    private readonly resolved = new Map<AttachedType, Codec>();

    constructor(options: CodecRegistryOptions = {}) {
        this.strategies = options.strategies ?? DEFAULT_STRATEGIES;
        for (const [type, override] of options.overrides ?? []) {
            if (isCodecStrategy(override) && !override.supports(type)) {
                throw new CodecUnavailableError(
                    `Override strategy '${override.name}' does not support ${typeName(type)}`,
                    typeName(type),
                );
            }
            this.overrides.set(type, override);
        }
    }

    resolve(type: AttachedType): Codec {
        const cached = this.resolved.get(type);
        if (cached) {
            return cached;
        }
        const codec = this.createCodec(type);
        this.resolved.set(type, codec);
        return codec;
    }

    /**
     * Codec for a route returning a JSON array of the type.
     */
    resolveList(type: AttachedType): Codec {
        const element = this.resolve(type);
        if (!isJsonCodec(element)) {
            throw new CodecUnavailableError(
                `${typeName(type)} uses a custom '${element.strategy}' codec, which cannot decode list elements`,
                typeName(type),
            );
        }
        return new ListCodec(element);
    }

    has(type: AttachedType): boolean {
        return this.resolved.has(type);
    }

    private createCodec(type: AttachedType): Codec {
        const override = this.overrides.get(type);
        if (override) {
            return isCodecStrategy(override) ? override.create(type) : override;
        }

        for (const strategy of this.strategies) {
            if (strategy.supports(type)) {
                return strategy.create(type);
            }
        }
        const tried = this.strategies.map((strategy) => strategy.name).join(', ');
        throw new CodecUnavailableError(
            `No codec strategy supports ${typeName(type)} (tried ${tried}). ` +
                `Add a static fromJson(), class-validator constraints, or a constructor without parameters.`,
            typeName(type),
        );
    }
}

/**
 * Registry used by routers created without one.
 */
export const defaultCodecRegistry = new CodecRegistry();
