import type { Result } from "~shared/utils/Result";

import type { TimezoneOffset } from "./TimezoneOffset";

export type UnknownTimezoneError = {
  type: "UNKNOWN_TIMEZONE";
  identifier: string;
  message: string;
};

export type ResolveOptions = {
  /** 在城市或固定偏移上加一小時夏令時間 */
  dst?: boolean;
  /** IANA 時區取偏移的參考時間點，預設為現在 */
  at?: Date;
};

/** 相機寫在中繼資料裡的時區資訊 */
export type CameraZoneHint = {
  offsetTime?: string;
  timeZone?: string;
  dst: boolean;
};

export interface TimezoneResolver {
  /**
   * 將城市名稱、偏移字串或 IANA 時區解析為偏移。
   * 無法解析時一律回傳 UNKNOWN_TIMEZONE，不會退回 UTC。
   */
  resolve(
    identifier: string,
    options?: ResolveOptions
  ): Result<TimezoneOffset, UnknownTimezoneError>;

  /**
   * 以相機牆上時間與可信的 UTC 時間（例如 GPS 時間）推算偏移，
   * 差值四捨五入到 15 分鐘。
   */
  infer(
    cameraLocal: Date,
    referenceUtc: Date
  ): Result<TimezoneOffset, UnknownTimezoneError>;

  /** 從相機中繼資料取得偏移 */
  detect(hint: CameraZoneHint): Result<TimezoneOffset, UnknownTimezoneError>;
}
