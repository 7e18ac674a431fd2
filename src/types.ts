export const stageNames = [
  "shift-to-utc",
  "organize",
  "geotag",
  "set-time",
  "rename",
] as const;

export type StageName = (typeof stageNames)[number];

/** 單筆紀錄層級的錯誤，只影響該筆，不中止整個階段 */
export type RecordErrorKind = "TIMESTAMP_PARSE_ERROR" | "IO_ERROR";

/** 階段層級的錯誤，會中止整個流程 */
export type StageFailureKind =
  | "UNKNOWN_TIMEZONE"
  | "PLANNING_ERROR"
  | "TOOL_ERROR"
  | "CANCELLED";

export type RecordError = { kind: RecordErrorKind; message: string };

export type StageFailure = { kind: StageFailureKind; message: string };

export type StageResult =
  | { status: "pending" }
  | { status: "success"; note?: string }
  | { status: "skipped"; note?: string }
  | { status: "failed"; error: RecordError };

export type StageStatus = StageResult["status"];

export type Coordinate = {
  latitude: number;
  longitude: number;
  altitude?: number;
};

export type PhotoRecord = {
  /** 掃描時的原始路徑 */
  originPath: string;
  /** 目前路徑，organize / rename 後會更新 */
  path: string;
  /** 掃描來源根目錄 */
  root: string;
  /** 中繼資料中的拍攝時間字串，例如 2024:05:01 10:00:01 */
  captureTimeRaw?: string;
  /** 中繼資料中的相機時區，例如 +02:00 */
  cameraOffset?: string;
  /** 相機 maker note 的標準時區（不含夏令時間） */
  cameraTimeZone?: string;
  cameraDst: boolean;
  /** GPS 時間（UTC），可作為推算相機時區的參考 */
  gpsTimeRaw?: string;
  /**
   * 檔案目前記錄的牆上時間。以 UTC 欄位承載，不代表真實時間點。
   */
  localTime: Date | null;
  /** 解析後的真實時間點 */
  utcTime: Date | null;
  /** 檔案內的牆上時間目前是否為 UTC */
  shiftedToUtc: boolean;
  coordinate: Coordinate | null;
  stages: Record<StageName, StageResult>;
};

export type MoveFile = { from: string; to: string };
