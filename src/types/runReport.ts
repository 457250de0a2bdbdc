import { CardType } from "./card";

export interface RunReportError {
  state: string;
  message: string;
}

export interface RunReportUrl {
  url: string;
  status: "done" | "failed" | "aborted" | "skipped";
  card_type: CardType | null;
  output_path: string | null;
  image: string | null;
  error: RunReportError | null;
}

export interface RunReport {
  schema_version: "1.0";
  url_list_path: string;
  output_dir: string;
  image_dir: string;
  started_at: string;
  ended_at: string;
  aborted: boolean;
  urls: RunReportUrl[];
}
