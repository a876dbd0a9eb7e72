import { UnknownRoleError } from "../shared/errors";
import { defaultRandom, sampleWithoutReplacement, type RandomSource } from "../shared/utils/random";
import roleQuestions from "./data/role-questions.json";

export interface RoleCatalogueEntry {
  readonly displayName: string;
  readonly questions: ReadonlyArray<string>;
}

export type RoleCatalogue = Readonly<Record<string, RoleCatalogueEntry>>;

export const DEFAULT_ROLE_CATALOGUE: RoleCatalogue = roleQuestions;

/**
 * Role-keyed catalogue of technical questions. Catalogue order is preserved by every
 * read; `sample` is the only operation that consumes randomness.
 */
export class QuestionBank {
  constructor(private readonly catalogue: RoleCatalogue = DEFAULT_ROLE_CATALOGUE) {}

  roles(): string[] {
    return Object.keys(this.catalogue);
  }

  has(role: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.catalogue, role);
  }

  displayName(role: string): string {
    return this.has(role) ? this.catalogue[role].displayName : role;
  }

  questionCount(role: string): number {
    return this.has(role) ? this.catalogue[role].questions.length : 0;
  }

  questionsFor(role: string): string[] {
    return [...this.entry(role).questions];
  }

  sample(role: string, count: number, random: RandomSource = defaultRandom): string[] {
    return sampleWithoutReplacement(this.entry(role).questions, count, random);
  }

  private entry(role: string): RoleCatalogueEntry {
    if (!this.has(role)) {
      throw new UnknownRoleError(role, this.roles());
    }
    return this.catalogue[role];
  }
}
