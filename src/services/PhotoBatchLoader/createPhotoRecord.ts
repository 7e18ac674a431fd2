import type { PhotoRecord, StageName, StageResult } from "@/types";

export function pendingStages(): Record<StageName, StageResult> {
  return {
    "shift-to-utc": { status: "pending" },
    organize: { status: "pending" },
    geotag: { status: "pending" },
    "set-time": { status: "pending" },
    rename: { status: "pending" },
  };
}

export function createPhotoRecord(
  init: Pick<PhotoRecord, "path" | "root"> & Partial<PhotoRecord>
): PhotoRecord {
  return {
    originPath: init.path,
    cameraDst: false,
    localTime: null,
    utcTime: null,
    shiftedToUtc: false,
    coordinate: null,
    stages: pendingStages(),
    ...init,
  };
}
