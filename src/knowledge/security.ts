import fs from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { KnowledgeSourceError, errorMessage } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import { BUNDLED_STANDARDS_PATH } from "../paths.js";

export const COMPLIANCE_FRAMEWORKS = [
  "owasp_top_10",
  "nist_cybersecurity_framework",
  "iso_27001",
  "soc2_type2",
  "gdpr_compliance",
] as const;

export type ComplianceFramework = (typeof COMPLIANCE_FRAMEWORKS)[number];

export const DEFAULT_CHECKLIST_FRAMEWORKS: readonly ComplianceFramework[] = [
  "owasp_top_10",
  "nist_cybersecurity_framework",
];

export const SECURITY_DOMAINS = [
  "identity_access_management",
  "data_protection",
  "network_security",
  "web_application",
  "cloud_security",
  "incident_response",
  "governance_risk_compliance",
] as const;

export const SEVERITY_WEIGHTS = { critical: 25, high: 15, medium: 8, low: 2 } as const;

export type Severity = keyof typeof SEVERITY_WEIGHTS;

/** Technologies grouped by the category names a control may list as applicable. */
export const TECHNOLOGY_CATEGORIES: Readonly<Record<string, readonly string[]>> = {
  web_frameworks: ["react", "vue", "angular", "svelte", "nextjs", "django", "fastapi", "flask", "express", "rails"],
  mobile_frameworks: ["react-native", "flutter", "swift", "kotlin"],
  cloud_platforms: ["aws", "azure", "gcp", "kubernetes", "docker"],
  databases: ["postgresql", "mysql", "mongodb", "redis", "sqlite"],
};

export const REVIEW_INTERVAL_DAYS = 90;

const DAY_MS = 24 * 3600 * 1000;

const controlSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().min(1),
    description: z.string(),
    domain: z.enum(SECURITY_DOMAINS),
    severity: z.enum(["critical", "high", "medium", "low"]),
    implementation_guidance: z.string().default(""),
    verification_criteria: z.array(z.string()).min(1),
    related_controls: z.array(z.string()).default([]),
    applicable_technologies: z.array(z.string()).default(["all"]),
  })
  .transform((c) => ({
    id: c.id,
    title: c.title,
    description: c.description,
    domain: c.domain,
    severity: c.severity,
    implementationGuidance: c.implementation_guidance.trim(),
    verificationCriteria: c.verification_criteria,
    relatedControls: c.related_controls,
    applicableTechnologies: c.applicable_technologies,
  }));

const standardsFileSchema = z.object({
  standards: z.array(
    z
      .object({
        framework: z.enum(COMPLIANCE_FRAMEWORKS),
        version: z.string(),
        publication_date: z.string(),
        controls: z.array(controlSchema),
      })
      .transform((s) => ({
        framework: s.framework,
        version: s.version,
        publicationDate: s.publication_date,
        controls: s.controls,
      }))
  ),
});

export type SecurityControl = z.output<typeof controlSchema>;
export type SecurityStandard = z.output<typeof standardsFileSchema>["standards"][number];

export type ComplianceStatus = "compliant" | "partially_compliant" | "not_implemented";

/** Which verification criteria are met, keyed by criterionKey(). */
export type ControlImplementation = Record<string, boolean>;

export interface ControlAssessment {
  controlId: string;
  status: ComplianceStatus;
  /** Fraction of criteria met, 0-1 */
  score: number;
  evidence: string[];
  gaps: string[];
  recommendations: string[];
}

export interface ComplianceAssessment {
  framework: ComplianceFramework;
  stack: string[];
  /** Severity-weighted, 0-100 */
  overallScore: number;
  controls: ControlAssessment[];
  /** "<id>: <title>" for critical controls that are not compliant */
  criticalGaps: string[];
  recommendations: string[];
  assessedAt: Date;
  nextReview: Date;
}

export function criterionKey(criterion: string): string {
  return criterion.toLowerCase().replace(/ /g, "_");
}

export function isControlApplicable(control: SecurityControl, stack: readonly string[]): boolean {
  const applicable = control.applicableTechnologies.map((t) => t.toLowerCase());
  if (applicable.includes("all")) return true;

  const techs = stack.map((t) => t.toLowerCase());
  if (techs.some((t) => applicable.includes(t))) return true;

  return Object.entries(TECHNOLOGY_CATEGORIES).some(
    ([category, members]) => applicable.includes(category) && techs.some((t) => members.includes(t))
  );
}

/** compliant at 90% of criteria met, partially compliant at 50%. */
export function assessControl(control: SecurityControl, implementation?: ControlImplementation): ControlAssessment {
  if (!implementation || Object.keys(implementation).length === 0) {
    return {
      controlId: control.id,
      status: "not_implemented",
      score: 0,
      evidence: [],
      gaps: [...control.verificationCriteria],
      recommendations: [`Implement ${control.title}`],
    };
  }

  const evidence: string[] = [];
  const gaps: string[] = [];
  for (const criterion of control.verificationCriteria) {
    if (implementation[criterionKey(criterion)] === true) evidence.push(criterion);
    else gaps.push(criterion);
  }

  const score = evidence.length / control.verificationCriteria.length;
  const status: ComplianceStatus =
    score >= 0.9 ? "compliant" : score >= 0.5 ? "partially_compliant" : "not_implemented";

  return {
    controlId: control.id,
    status,
    score,
    evidence,
    gaps,
    recommendations: gaps.map((gap) => `Address gap: ${gap}`),
  };
}

/** Partially compliant controls earn half their severity weight. */
export function overallScore(controls: SecurityControl[], assessments: ControlAssessment[]): number {
  let earned = 0;
  let possible = 0;
  controls.forEach((control, i) => {
    const weight = SEVERITY_WEIGHTS[control.severity];
    possible += weight;
    const status = assessments[i]?.status;
    if (status === "compliant") earned += weight;
    else if (status === "partially_compliant") earned += weight * 0.5;
  });
  return possible === 0 ? 0 : Math.round((earned / possible) * 1000) / 10;
}

function stackRecommendations(stack: readonly string[]): string[] {
  const techs = stack.map((t) => t.toLowerCase());
  const recommendations: string[] = [];
  if (techs.includes("django")) {
    recommendations.push("Enable Django's security middleware and run `manage.py check --deploy`");
  }
  if (techs.includes("fastapi")) {
    recommendations.push("Add authentication dependencies and rate limiting to FastAPI routes");
  }
  if (techs.some((t) => TECHNOLOGY_CATEGORIES.cloud_platforms?.includes(t))) {
    recommendations.push("Turn on the cloud provider's audit logging and security posture checks");
  }
  return recommendations;
}

export function renderChecklist(
  technology: string,
  checklist: Partial<Record<ComplianceFramework, string[]>>
): string {
  const lines = [`# Security checklist: ${technology}`];
  for (const [framework, items] of Object.entries(checklist)) {
    if (!items) continue;
    lines.push("", `## ${framework}`, "");
    if (items.length === 0) lines.push("No applicable controls.");
    else lines.push(...items.map((item) => `- ${item}`));
  }
  return `${lines.join("\n")}\n`;
}

export interface SecurityComplianceProviderOpts {
  /** Standards to serve; read from `standardsPath` when omitted */
  standards?: SecurityStandard[];
  standardsPath?: string;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Security controls for a technology stack, read from bundled control data,
 * and severity-weighted compliance assessments. Assessments are reused until
 * their review date.
 */
export class SecurityComplianceProvider {
  private standards: Promise<Map<ComplianceFramework, SecurityStandard>> | null = null;
  private assessments = new Map<string, ComplianceAssessment>();
  private standardsPath: string;
  private now: () => Date;
  private logger: Logger;

  constructor(private opts: SecurityComplianceProviderOpts = {}) {
    this.standardsPath = opts.standardsPath ?? BUNDLED_STANDARDS_PATH;
    this.now = opts.now ?? (() => new Date());
    this.logger = (opts.logger ?? getLogger()).child({ component: "security-standards" });
  }

  loadStandards(): Promise<Map<ComplianceFramework, SecurityStandard>> {
    this.standards ??= this.readStandards().then(
      (standards) => new Map(standards.map((s) => [s.framework, s])),
      (err: unknown) => {
        this.standards = null;
        throw err;
      }
    );
    return this.standards;
  }

  async getComplianceRequirements(
    frameworks: readonly ComplianceFramework[],
    stack: readonly string[],
    domain?: (typeof SECURITY_DOMAINS)[number]
  ): Promise<Partial<Record<ComplianceFramework, SecurityControl[]>>> {
    const standards = await this.loadStandards();
    const requirements: Partial<Record<ComplianceFramework, SecurityControl[]>> = {};

    for (const framework of frameworks) {
      const standard = standards.get(framework);
      if (!standard) {
        this.logger.warn({ framework }, "No controls loaded for framework");
        continue;
      }
      requirements[framework] = standard.controls.filter(
        (c) => isControlApplicable(c, stack) && (domain === undefined || c.domain === domain)
      );
    }

    return requirements;
  }

  /** Checklist lines of the form "[ ] <criterion> (<control id>)" per framework. */
  async getSecurityChecklist(
    stack: readonly string[],
    frameworks: readonly ComplianceFramework[] = DEFAULT_CHECKLIST_FRAMEWORKS
  ): Promise<Partial<Record<ComplianceFramework, string[]>>> {
    const requirements = await this.getComplianceRequirements(frameworks, stack);
    const checklist: Partial<Record<ComplianceFramework, string[]>> = {};
    for (const framework of frameworks) {
      const controls = requirements[framework];
      if (!controls) continue;
      checklist[framework] = controls.flatMap((c) =>
        c.verificationCriteria.map((criterion) => `[ ] ${criterion} (${c.id})`)
      );
    }
    return checklist;
  }

  /**
   * Assess `implementations` (control id -> criteria met) against the
   * framework's controls that apply to `stack`.
   */
  async assessCompliance(
    framework: ComplianceFramework,
    stack: readonly string[],
    implementations: Record<string, ControlImplementation>
  ): Promise<ComplianceAssessment> {
    const cacheKey = `${framework}:${[...stack].sort().join(":")}`;
    const now = this.now();
    const previous = this.assessments.get(cacheKey);
    if (previous && now < previous.nextReview) {
      this.logger.debug({ framework, stack }, "Reusing compliance assessment");
      return previous;
    }

    const standard = (await this.loadStandards()).get(framework);
    if (!standard) throw new KnowledgeSourceError(`No controls loaded for framework ${framework}`);

    const controls = standard.controls.filter((c) => isControlApplicable(c, stack));
    const assessed = controls.map((c) => assessControl(c, implementations[c.id]));

    const total = assessed.length;
    const notImplemented = assessed.filter((a) => a.status === "not_implemented").length;
    const partial = assessed.filter((a) => a.status === "partially_compliant").length;

    const recommendations: string[] = [];
    if (total > 0 && notImplemented / total > 0.5) {
      recommendations.push("Implement the critical and high severity controls first");
    }
    if (total > 0 && partial / total > 0.3) {
      recommendations.push("Finish the partially implemented controls before adding new ones");
    }
    recommendations.push(...stackRecommendations(stack));

    const assessment: ComplianceAssessment = {
      framework,
      stack: [...stack],
      overallScore: overallScore(controls, assessed),
      controls: assessed,
      criticalGaps: controls
        .filter((c, i) => c.severity === "critical" && assessed[i]?.status !== "compliant")
        .map((c) => `${c.id}: ${c.title}`),
      recommendations,
      assessedAt: now,
      nextReview: new Date(now.getTime() + REVIEW_INTERVAL_DAYS * DAY_MS),
    };

    this.assessments.set(cacheKey, assessment);
    this.logger.info(
      { framework, stack, overallScore: assessment.overallScore, controls: total },
      "Assessed compliance"
    );
    return assessment;
  }

  private async readStandards(): Promise<SecurityStandard[]> {
    if (this.opts.standards) return this.opts.standards;

    let raw: unknown;
    try {
      raw = parse(await fs.readFile(this.standardsPath, "utf-8"));
    } catch (err) {
      throw new KnowledgeSourceError(`Cannot read security standards ${this.standardsPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const parsed = standardsFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new KnowledgeSourceError(
        `Invalid security standards ${this.standardsPath}: ${parsed.error.issues[0]?.message ?? "unknown error"}`,
        { cause: parsed.error }
      );
    }
    return parsed.data.standards;
  }
}
