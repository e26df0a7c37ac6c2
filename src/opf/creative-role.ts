import relators from '../data/creative-roles.json';

const DEFAULT_ROLES: ReadonlyMap<string, string> = new Map(Object.entries(relators));

const CUSTOM_PREFIX = 'oth.';

/**
 * The role someone had in creating a publication, as a MARC relator code. Codes outside the relator list are
 * kept as custom roles, written with an `oth.` prefix.
 */
export class CreativeRole {
    private constructor(readonly code: string, readonly name: string | null) {}

    static readonly AUTHOR = CreativeRole.of('aut');
    static readonly EDITOR = CreativeRole.of('edt');
    static readonly ILLUSTRATOR = CreativeRole.of('ill');
    static readonly TRANSLATOR = CreativeRole.of('trl');

    static of(code: string): CreativeRole {
        const name = DEFAULT_ROLES.get(code);
        if (name !== undefined) {
            return new CreativeRole(code, name);
        }
        return new CreativeRole(code.startsWith(CUSTOM_PREFIX) ? code : `${CUSTOM_PREFIX}${code}`, null);
    }

    static get defaults(): CreativeRole[] {
        return [...DEFAULT_ROLES.keys()].map(code => CreativeRole.of(code));
    }

    get isCustom(): boolean {
        return !DEFAULT_ROLES.has(this.code);
    }

    equals(other: CreativeRole): boolean {
        return this.code === other.code;
    }

    toString(): string {
        return this.name === null ? this.code : `${this.name} (${this.code})`;
    }
}
