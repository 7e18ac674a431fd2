export const defaultMediaExtensions = [".jpg", ".mp4"] as const;

export const trackExtensions = [".gpx"] as const;

export const defaultConcurrency = 4;

/** geotag 允許照片時間落在軌跡點之外的秒數 */
export const defaultTimeRangeSeconds = 10;

/** 合法的 UTC 偏移範圍（分鐘），-12:00..+14:00 */
export const minOffsetMinutes = -12 * 60;
export const maxOffsetMinutes = 14 * 60;
