import { plainToClassFromExist, instanceToPlain } from 'class-transformer';
import { getMetadataStorage, validateSync, ValidationError } from 'class-validator';
import { toError } from '@restbind/core-util';
import { AttachedType, typeName } from '../decorators';
import { CodecUnavailableError, DecodeError } from '../errors';
import { Codec, isPlainRecord, JsonCodec } from './Codec';

/**
 * CodecStrategy - One family of attached types and how to (de)serialize it.
 *
 * supports() is the capability check; it runs once, when a type is registered.
 * create() is only called for types supports() accepted.
 */
export interface CodecStrategy {
    readonly name: string;
    supports(type: AttachedType): boolean;
    create<T>(type: AttachedType<T>): Codec<T>;
}

/**
 * Shape of a class with explicit JSON hooks:
 * ```typescript
 * class Money {
 *     static fromJson(data: unknown): Money { ... }
 *     toJson(): unknown { ... }
 * }
 * ```
 */
export interface JsonHooks<T> {
    fromJson(data: unknown): T;
}

export function hasJsonHooks<T>(type: AttachedType<T>): type is AttachedType<T> & JsonHooks<T> {
    return 'fromJson' in type && typeof type.fromJson === 'function';
}

/**
 * True for classes whose constructor declares no parameters.
 */
export function isConstructibleWithoutArgs(type: AttachedType): boolean {
    return typeof type === 'function' && typeof type.prototype === 'object' && type.length === 0;
}

function toJsonValue(value: unknown): unknown {
    if (typeof value === 'object' && value !== null && 'toJson' in value && typeof value.toJson === 'function') {
        const json: unknown = value.toJson();
        return json;
    }
    return value;
}

function instantiate<T>(type: AttachedType<T>): T & object {
    const instance = new type();
    if (typeof instance !== 'object' || instance === null) {
        throw new DecodeError(`${typeName(type)} did not construct an object`);
    }
    return instance;
}

function wrapDecodeFailure(error: Error, type: AttachedType): DecodeError {
    if (error instanceof DecodeError) {
        return error;
    }
    return new DecodeError(`Cannot build ${typeName(type)}: ${error.message}`, [], error);
}

class HooksCodec<T> extends JsonCodec<T> {
    readonly strategy = 'hooks';

    constructor(private readonly type: AttachedType<T> & JsonHooks<T>) {
        super();
    }

    fromData(data: unknown): T {
        try {
            return this.type.fromJson(data);
        } catch (err: unknown) {
            const error = toError(err);
            throw wrapDecodeFailure(error, this.type);
        }
    }

    toData(value: unknown): unknown {
        return toJsonValue(value);
    }
}

/**
 * hooks - The class provides a static fromJson(); instances may provide toJson().
 */
export const hooksStrategy: CodecStrategy = {
    name: 'hooks',
    supports(type: AttachedType): boolean {
        return hasJsonHooks(type);
    },
    create<T>(type: AttachedType<T>): Codec<T> {
        if (!hasJsonHooks(type)) {
            throw new CodecUnavailableError(`${typeName(type)} has no static fromJson()`, typeName(type));
        }
        return new HooksCodec(type);
    },
};

/**
 * Flattens nested class-validator errors into constraint messages.
 */
export function formatValidationErrors(errors: ValidationError[]): string[] {
    const messages: string[] = [];
    for (const error of errors) {
        if (error.constraints) {
            messages.push(...Object.values(error.constraints));
        }
        if (error.children && error.children.length > 0) {
            messages.push(...formatValidationErrors(error.children));
        }
    }
    return messages;
}

class SchemaModelCodec<T> extends JsonCodec<T> {
    readonly strategy = 'schema';

    constructor(private readonly type: AttachedType<T>) {
        super();
    }

    fromData(data: unknown): T {
        if (!isPlainRecord(data)) {
            throw new DecodeError(`Expected a JSON object for ${typeName(this.type)}`);
        }
        let instance: T & object;
        try {
            instance = plainToClassFromExist(instantiate(this.type), data);
        } catch (err: unknown) {
            const error = toError(err);
            throw wrapDecodeFailure(error, this.type);
        }
        const violations = formatValidationErrors(validateSync(instance));
        if (violations.length > 0) {
            throw new DecodeError(
                `${typeName(this.type)} failed validation: ${violations.join('; ')}`,
                violations,
            );
        }
        return instance;
    }

    toData(value: unknown): unknown {
        if (value instanceof this.type) {
            return instanceToPlain(value);
        }
        return value;
    }
}

function hasValidationMetadata(type: AttachedType): boolean {
    return getMetadataStorage().getTargetValidationMetadatas(type, '', false, false).length > 0;
}

/**
 * schema - A class-validator model: at least one constraint decorator and a no-argument constructor.
 * Decoding runs class-transformer, then validateSync().
 */
export const schemaModelStrategy: CodecStrategy = {
    name: 'schema',
    supports(type: AttachedType): boolean {
        return isConstructibleWithoutArgs(type) && hasValidationMetadata(type);
    },
    create<T>(type: AttachedType<T>): Codec<T> {
        if (!isConstructibleWithoutArgs(type)) {
            throw new CodecUnavailableError(`${typeName(type)} needs constructor arguments`, typeName(type));
        }
        return new SchemaModelCodec(type);
    },
};

class PermissiveCodec<T> extends JsonCodec<T> {
    readonly strategy = 'permissive';

    constructor(private readonly type: AttachedType<T>) {
        super();
    }

    fromData(data: unknown): T {
        if (!isPlainRecord(data)) {
            throw new DecodeError(`Expected a JSON object for ${typeName(this.type)}`);
        }
        return Object.assign(instantiate(this.type), data);
    }
}

/**
 * permissive - Any class constructible without arguments; JSON fields are copied onto a new instance.
 */
export const permissiveStrategy: CodecStrategy = {
    name: 'permissive',
    supports(type: AttachedType): boolean {
        return isConstructibleWithoutArgs(type);
    },
    create<T>(type: AttachedType<T>): Codec<T> {
        if (!isConstructibleWithoutArgs(type)) {
            throw new CodecUnavailableError(`${typeName(type)} needs constructor arguments`, typeName(type));
        }
        return new PermissiveCodec(type);
    },
};

/**
 * Strategy order used by every registry unless told otherwise.
 */
export const DEFAULT_STRATEGIES: readonly CodecStrategy[] = [hooksStrategy, schemaModelStrategy, permissiveStrategy];
