export interface ResumeEducation {
  readonly degree: string;
  readonly institution: string;
  readonly year: string;
}

export interface ResumeExperience {
  readonly title: string;
  readonly company: string;
  readonly duration: string;
  readonly description: string;
}

export interface ResumeProject {
  readonly title: string;
  readonly tech: ReadonlyArray<string>;
  readonly description: string;
}

export interface ResumeRecord {
  readonly name: string;
  readonly email: string;
  readonly phone: string;
  readonly education: ReadonlyArray<ResumeEducation>;
  readonly skills: ReadonlyArray<string>;
  readonly experience: ReadonlyArray<ResumeExperience>;
  readonly projects: ReadonlyArray<ResumeProject>;
}
