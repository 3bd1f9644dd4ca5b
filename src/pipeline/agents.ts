import type { Role } from "../roles.js";
import type { ExtractionMode } from "./extract.js";

export type RoleProfile = {
  title: string;
  mode: ExtractionMode;
  /** When false an unparsable reply is kept as `raw_content` instead of failing the run. */
  requiresStructure: boolean;
  instructions: string;
  task: string;
};

const JSON_RULES = `Rules:
- Return ONLY valid JSON (no markdown fences, no commentary).
- Use plain ASCII punctuation.
- If the reply would be long, keep structure complete before adding detail.`;

export const FILE_MANIFEST_RULES = `For each file use the format:

### File: path/to/file.ext
\`\`\`
file content
\`\`\`

Paths are relative to the project root. Do not wrap the whole reply in JSON.`;

export const ROLE_PROFILES: Record<Role, RoleProfile> = {
  business: {
    title: "Business Analyst",
    mode: "json",
    requiresStructure: false,
    instructions: `You are a Business Analyst.

Turn raw project requirements into a specification with these top-level keys:
projectOverview, userStories, functionalRequirements, nonFunctionalRequirements, businessRules, successCriteria.

${JSON_RULES}`,
    task: "Analyze these project requirements and create detailed specifications."
  },
  architecture: {
    title: "Software Architect",
    mode: "json",
    requiresStructure: true,
    instructions: `You are a Software Architect specialized in system design.

Create a complete architecture specification with these top-level keys:
system_overview, component_architecture, data_model, api_design, technology_stack, deployment_architecture.

${JSON_RULES}`,
    task: "Design a complete system architecture for these requirements."
  },
  developer: {
    title: "Software Developer",
    mode: "files",
    requiresStructure: true,
    instructions: `You are an expert Software Developer.

Generate complete implementation files for the provided architecture and specifications.
${FILE_MANIFEST_RULES}`,
    task: "Generate the implementation files for this architecture and these specifications."
  },
  qa: {
    title: "QA Engineer",
    mode: "json",
    requiresStructure: true,
    instructions: `You are a QA Engineer specialized in software testing.

Create a test plan with these top-level keys:
test_strategy, test_cases, integration_tests, performance_tests, security_tests, acceptance_criteria.

${JSON_RULES}`,
    task: "Create a test plan and test cases for this implementation."
  },
  audit: {
    title: "Code Auditor",
    mode: "json",
    requiresStructure: true,
    instructions: `You are a Code Auditor reviewing an implementation and its test plan.

Report with these top-level keys:
summary, security_findings, quality_findings, test_coverage_gaps, recommendations.
Each finding has id, severity (low|medium|high|critical), description, location.

${JSON_RULES}`,
    task: "Audit this implementation and its test plan."
  },
  documentation: {
    title: "Technical Writer",
    mode: "json",
    requiresStructure: false,
    instructions: `You are a Technical Writer.

Produce project documentation as {"sections": [{"title": string, "content": markdown string}]}.
Cover overview, architecture, setup, usage, testing and audit notes.

${JSON_RULES}`,
    task: "Write the project documentation from every upstream result below."
  }
};
