export type MediaKind = "image" | "video";

export type MediaFile = {
  fileName: string;
  fullPath: string;
  /** 小寫、含 `.` */
  extension: string;
  kind: MediaKind;
  /** 掃描當下的大小，只用於統計 */
  size: number;
};

export type DateSource =
  | "exif"
  | "container"
  | "video-filename"
  | "filename"
  | "mtime"
  | "sentinel";

export type CalendarDate = {
  year: number;
  month: number;
  day: number;
};

export type ResolvedDate = CalendarDate & { source: DateSource };

export type DuplicatePolicy = "keep" | "delete";

export type DestinationPlan = {
  sourcePath: string;
  destinationPath: string;
  dateFolder: string;
  fileSize: number;
  resolvedDate: ResolvedDate;
};

export type SkipReason = "vanished" | "duplicate" | "already-in-place";

export type PlanOutcome =
  | { status: "planned"; plan: DestinationPlan }
  | { status: "skipped"; sourcePath: string; reason: SkipReason }
  | { status: "failed"; sourcePath: string; error: string };

export type ExecuteOutcome =
  | { status: "moved"; sourcePath: string; destinationPath: string }
  | { status: "skipped"; sourcePath: string; reason: SkipReason }
  | { status: "failed"; sourcePath: string; error: string };

export type FileOutcome =
  | Exclude<PlanOutcome, { status: "planned" }>
  | ExecuteOutcome;
