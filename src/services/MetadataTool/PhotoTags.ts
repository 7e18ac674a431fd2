import type { Coordinate } from "@/types";

export type PhotoTags = {
  /** 檔案完整路徑 */
  filePath: string;

  /** 拍攝時間原始字串（DateTimeOriginal，影片退回 CreateDate） */
  captureTime?: string;

  /** OffsetTimeOriginal */
  offsetTime?: string;

  /** 相機 maker note 的 TimeZone */
  timeZone?: string;

  /** 相機是否開啟夏令時間 */
  daylightSavings: boolean;

  /** GPS 衛星時間（UTC） */
  gpsTime?: string;

  coordinate?: Coordinate;
};

/** 寫入時的時區資訊，null 表示清除 */
export type ZoneTags = {
  /** 例如 +02:00，已含夏令時間 */
  offset: string;
  /** 不含夏令時間的偏移，寫入 TimeZone */
  standardOffset: string;
  dst: boolean;
  cityCode?: number;
};

export type TagsUpdate = {
  /** 寫入 DateTimeOriginal / CreateDate / ModifyDate */
  captureTime?: string;
  zone?: ZoneTags | null;
};

export type MetadataError =
  | { type: "IO_ERROR"; message: string }
  | { type: "TOOL_ERROR"; message: string };
