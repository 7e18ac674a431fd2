import path from "node:path";

import { formatWallClock } from "@/services/TimestampShift";

export type PlanSubject = {
  source: string;
  utcTime: Date;
  /** 掃描根目錄，organize 以此為輸出根 */
  root: string;
};

export interface NamingScheme {
  readonly name: string;
  /** 產生未消除衝突前的候選路徑，必須是純函式 */
  candidate(subject: PlanSubject): string;
}

export const dateDirectoryPattern = "yyyy-MM-dd";
export const dateTimeFileNamePattern = "yyyy-MM-dd_HH-mm-ss";

/** <root>/<yyyy-MM-dd>/<原檔名> */
export const organizeScheme: NamingScheme = {
  name: "organize",
  candidate: (subject) =>
    path.join(
      subject.root,
      formatWallClock(subject.utcTime, dateDirectoryPattern),
      path.basename(subject.source)
    ),
};

/** <目前目錄>/<yyyy-MM-dd_HH-mm-ss>.<小寫副檔名> */
export const renameScheme: NamingScheme = {
  name: "rename",
  candidate: (subject) =>
    path.join(
      path.dirname(subject.source),
      `${formatWallClock(subject.utcTime, dateTimeFileNamePattern)}${path
        .extname(subject.source)
        .toLowerCase()}`
    ),
};

/** photo.jpg + 2 → photo_2.jpg */
export function withSuffix(filePath: string, n: number) {
  const ext = path.extname(filePath);
  const stem = path.basename(filePath, ext);
  return path.join(path.dirname(filePath), `${stem}_${n}${ext}`);
}
