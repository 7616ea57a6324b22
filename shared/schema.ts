import { z } from "zod";

// Primary labels, in tie-break order: the first label with the top score wins.
export const PRIMARY_LABELS = [
  "executive_summary",
  "solution_overview",
  "operational_details",
  "case_study",
  "compliance_security",
  "project_plan",
  "pricing",
  "other",
  "unclassified",
] as const;
export type PrimaryLabel = typeof PRIMARY_LABELS[number];

// Canonical proposal order; build_full_proposal walks sections in this order.
export const BACKEND_SECTIONS = [
  "executive_summary",
  "client_understanding",
  "solution_overview",
  "delivery_model",
  "technology",
  "governance_compliance",
  "implementation",
  "team_leadership",
  "proof_points",
] as const;
export type BackendSection = typeof BACKEND_SECTIONS[number];

export const SECTION_DISPLAY_NAMES: Record<BackendSection, string> = {
  executive_summary: "Executive Summary",
  client_understanding: "Understanding Client Needs",
  solution_overview: "Solution Overview",
  delivery_model: "Delivery Model",
  technology: "Technology & Innovation",
  governance_compliance: "Governance & Compliance",
  implementation: "Implementation & Transition",
  team_leadership: "Team & Leadership",
  proof_points: "Proof Points & Evidence",
};

export const primaryLabelSchema = z.enum(PRIMARY_LABELS);
export const backendSectionSchema = z.enum(BACKEND_SECTIONS);

export const textSegmentSchema = z.object({
  text: z.string(),
  bold: z.boolean().default(false),
  italic: z.boolean().default(false),
  underline: z.boolean().default(false),
  color: z
    .string()
    .regex(/^#?[0-9a-fA-F]{6}$/, "Color must be a 6-digit hex value")
    .optional(),
  fontSize: z.number().int().positive().optional(),
});
export type TextSegment = z.infer<typeof textSegmentSchema>;

export const tableCellSchema = z.union([z.string(), z.number(), z.boolean()]);
export type TableCell = z.infer<typeof tableCellSchema>;

export const slideContentSchema = z.object({
  sectionType: backendSectionSchema,
  title: z.string(),
  bodySegments: z.array(textSegmentSchema).default([]),
  tableData: z.array(z.array(tableCellSchema)).optional(),
  speakerNotes: z.string().optional(),
});
export type SlideContent = z.infer<typeof slideContentSchema>;
export type SlideContentInput = z.input<typeof slideContentSchema>;
