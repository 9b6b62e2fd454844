/** One table row of a listing page, before download. */
export interface RowDescriptor {
  title: string;
  caseNumber: string;
  deliveredOnRaw: string;
  pdfUrl: string;
  /** Empty when the case-number cell carries no link. */
  pdfPreviewUrl: string;
  /** Zero-based listing page; assigned by the scheduler. */
  pageIndex: number;
}

export interface JudgmentRecord {
  caseNumber: string | null;
  caseTitle: string | null;
  /** `YYYY-MM-DD HH:MM:SS` at local midnight, or null when the date text is not recognised. */
  judgmentDate: string | null;
  fileName: string;
  content: string;
  pageCount: number;
  /** 1-based listing page the row came from. */
  pageNumber: number;
  /** UTC, `YYYY-MM-DD HH:MM:SS`. */
  extractedAt: string;
  downloadUrl: string;
  pdfPreviewUrl: string | null;
}

/** Column layout of the judgments table. */
export interface JudgmentRow {
  case_number: string | null;
  case_title: string | null;
  judgment_date: string | null;
  file_name: string;
  content: string;
  page_count: number;
  page_number: number;
  extracted_at: string;
  download_url: string;
  pdf_preview_url: string | null;
}
