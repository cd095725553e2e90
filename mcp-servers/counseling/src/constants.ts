import type {
  ApplicationPlatform, ApplicationStatus, IsApplying, RequirementTrackerStatus, TaskStatus,
} from "./types.js";

// Valid state transitions for a task. Reopening is allowed; it never rolls back tracker fields.
export const VALID_TASK_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  open: ["assigned", "completed"],
  assigned: ["open", "completed"],
  completed: ["open", "assigned"],
};

export const REQUIREMENT_TRACKER_STATUSES = [
  "", "n_a", "required", "optional", "assigned", "in_progress", "requested", "received",
] as const satisfies readonly RequirementTrackerStatus[];

export const APPLICATION_STATUSES = [
  "n_a", "in_progress", "ready", "on_deck", "submitted",
] as const satisfies readonly ApplicationStatus[];

export const IS_APPLYING_VALUES = ["YES", "NO", "MAYBE"] as const satisfies readonly IsApplying[];

export const APPLICATION_PLATFORMS = [
  "", "common_app", "uc", "coalition", "apply_texas", "questbridge", "ucas", "school_specific",
] as const satisfies readonly ApplicationPlatform[];

// Tracker fields whose values move through the requirement state set
export const REQUIREMENT_TRACKER_FIELDS = [
  "transcript_status",
  "test_scores_status",
  "recommendation_one_status",
  "recommendation_two_status",
  "recommendation_three_status",
  "recommendation_four_status",
] as const;

export type RequirementTrackerField = (typeof REQUIREMENT_TRACKER_FIELDS)[number];

// Fields a task template may set on assign / on complete
export const UPDATABLE_TRACKER_FIELDS = [
  ...REQUIREMENT_TRACKER_FIELDS,
  "application_status",
] as const;

export type UpdatableTrackerField = (typeof UPDATABLE_TRACKER_FIELDS)[number];

// Fields a task template may filter tracker rows on
export const FILTERABLE_TRACKER_FIELDS = [
  "school_id",
  "is_applying",
  "application",
  ...UPDATABLE_TRACKER_FIELDS,
] as const;

export type FilterableTrackerField = (typeof FILTERABLE_TRACKER_FIELDS)[number];

export const TASK_TYPES = [
  "essay", "rec", "school_research", "survey", "testing", "transcripts", "other",
] as const;

export const DUPLICATE_POLICIES = ["reject", "skip_existing", "allow"] as const;

export type DuplicateApplicationPolicy = (typeof DUPLICATE_POLICIES)[number];
