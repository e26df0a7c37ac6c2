export enum ReferenceType {
    Cover = 'cover',
    TitlePage = 'title-page',
    TableOfContents = 'toc',
    Index = 'index',
    Glossary = 'glossary',
    Acknowledgements = 'acknowledgements',
    Bibliography = 'bibliography',
    Colophon = 'colophon',
    CopyrightPage = 'copyright-page',
    Dedication = 'dedication',
    Epigraph = 'epigraph',
    Foreword = 'foreword',
    ListOfIllustrations = 'loi',
    ListOfTables = 'lot',
    Notes = 'notes',
    Preface = 'preface',
    Text = 'text'
}

const REFERENCE_TYPES: readonly ReferenceType[] = Object.values(ReferenceType);

export function referenceTypeOf(value: string): ReferenceType | null {
    return REFERENCE_TYPES.find(type => type === value) ?? null;
}

/**
 * What to do when a corrected custom reference collides with a reference of the canonical type that is
 * already in the guide.
 */
export enum CorrectorDuplicationStrategy {
    /** The existing reference is replaced by the corrected one. */
    ReplaceExisting = 'replace-existing',
    /** The custom reference is dropped and the existing one kept. */
    RemoveCustom = 'remove-custom',
    /** Both stay as they are. */
    DoNothing = 'do-nothing'
}

export class CorrectionAlreadyExistsError extends Error {
    constructor(readonly customType: string) {
        super(`A correction for the custom type '${customType}' already exists`);
        this.name = 'CorrectionAlreadyExistsError';
    }
}

export const DEFAULT_CORRECTIONS: Readonly<Record<string, ReferenceType>> = {
    copyright: ReferenceType.CopyrightPage
};

/**
 * Maps custom guide types that are misspellings of canonical ones to the canonical type. Corrections can be
 * added but never removed.
 */
export class GuideReferenceCorrector {
    private readonly corrections = new Map<string, ReferenceType>();

    constructor(initial: Readonly<Record<string, ReferenceType>> = DEFAULT_CORRECTIONS) {
        for (const [customType, type] of Object.entries(initial)) {
            this.addCorrection(customType, type);
        }
    }

    /**
     * @throws CorrectionAlreadyExistsError when `customType` already has a correction
     */
    addCorrection(customType: string, type: ReferenceType): void {
        if (this.corrections.has(customType)) {
            throw new CorrectionAlreadyExistsError(customType);
        }
        this.corrections.set(customType, type);
    }

    getCorrection(customType: string): ReferenceType | null {
        return this.corrections.get(customType) ?? null;
    }

    hasCorrection(customType: string): boolean {
        return this.corrections.has(customType);
    }

    getCorrectionsFor(type: ReferenceType): string[] {
        return [...this.corrections].filter(([, target]) => target === type).map(([customType]) => customType);
    }
}
