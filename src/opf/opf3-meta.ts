import { Result, ok, ReadingDirection } from '../types';
import { Property, encodeProperty } from '../xml/property-parser';
import { CreativeRole } from './creative-role';

/**
 * Turns the text of an OPF3 `meta` element into a typed value and back.
 */
export interface MetaCodec<T> {
    decode(text: string): Result<T, string>;
    encode(value: T): string;
}

export const STRING_CODEC: MetaCodec<string> = {
    decode: text => ok(text),
    encode: value => value
};

export const CREATIVE_ROLE_CODEC: MetaCodec<CreativeRole> = {
    decode: text => ok(CreativeRole.of(text)),
    encode: role => role.code
};

export class IllegalSchemeError extends Error {
    constructor(readonly scheme: string) {
        super(`Scheme '${scheme}' has a typed codec, create the meta through it instead of as a string`);
        this.name = 'IllegalSchemeError';
    }
}

/**
 * Maps `scheme` attribute values to the codec used for metas carrying that scheme. Metas with a scheme that is
 * not registered are read as strings.
 */
export class Opf3MetaRegistry {
    private readonly codecs = new Map<string, MetaCodec<unknown>>();

    register<T>(scheme: string, codec: MetaCodec<T>): this {
        this.codecs.set(scheme, codec);
        return this;
    }

    has(scheme: string | null): boolean {
        return scheme !== null && this.codecs.has(scheme);
    }

    codecFor(scheme: string | null): MetaCodec<unknown> | null {
        return scheme === null ? null : this.codecs.get(scheme) ?? null;
    }

    get schemes(): string[] {
        return [...this.codecs.keys()];
    }
}

export const MARC_RELATORS_SCHEME = 'marc:relators';

export function createDefaultRegistry(): Opf3MetaRegistry {
    return new Opf3MetaRegistry().register(MARC_RELATORS_SCHEME, CREATIVE_ROLE_CODEC);
}

export interface Opf3MetaOptions {
    identifier?: string | null;
    direction?: ReadingDirection | null;
    /** IRI of the element this meta refines, usually `#id`. */
    refines?: string | null;
    scheme?: string | null;
    language?: string | null;
}

export class Opf3Meta<T = unknown> {
    identifier: string | null;
    direction: ReadingDirection | null;
    refines: string | null;
    language: string | null;
    readonly scheme: string | null;

    constructor(
        public property: Property,
        public value: T,
        readonly codec: MetaCodec<T>,
        options: Opf3MetaOptions = {}
    ) {
        this.identifier = options.identifier ?? null;
        this.direction = options.direction ?? null;
        this.refines = options.refines ?? null;
        this.scheme = options.scheme ?? null;
        this.language = options.language ?? null;
    }

    /**
     * Creates a meta with a plain string value.
     *
     * @throws IllegalSchemeError when `options.scheme` is registered with a typed codec
     */
    static createString(
        property: Property,
        value: string,
        options: Opf3MetaOptions = {},
        registry: Opf3MetaRegistry = DEFAULT_REGISTRY
    ): Opf3Meta<string> {
        const scheme = options.scheme ?? null;
        if (scheme !== null && registry.has(scheme)) {
            throw new IllegalSchemeError(scheme);
        }
        return new Opf3Meta(property, value, STRING_CODEC, options);
    }

    static createCreativeRole(property: Property, role: CreativeRole, options: Omit<Opf3MetaOptions, 'scheme'> = {}): Opf3Meta<CreativeRole> {
        return new Opf3Meta(property, role, CREATIVE_ROLE_CODEC, { ...options, scheme: MARC_RELATORS_SCHEME });
    }

    get content(): string {
        return this.codec.encode(this.value);
    }

    /** The `id` this meta refines, without the leading `#`. */
    get refinesTarget(): string | null {
        if (this.refines === null) {
            return null;
        }
        return this.refines.startsWith('#') ? this.refines.substring(1) : this.refines;
    }

    toString(): string {
        return `meta(${encodeProperty(this.property)}=${this.content})`;
    }
}

export const DEFAULT_REGISTRY = createDefaultRegistry();
