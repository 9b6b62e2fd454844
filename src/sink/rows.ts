import type { JudgmentRecord, JudgmentRow } from "../types";

export function toJudgmentRow(record: JudgmentRecord): JudgmentRow {
  return {
    case_number: record.caseNumber,
    case_title: record.caseTitle,
    judgment_date: record.judgmentDate,
    file_name: record.fileName,
    content: record.content,
    page_count: record.pageCount,
    page_number: record.pageNumber,
    extracted_at: record.extractedAt,
    download_url: record.downloadUrl,
    pdf_preview_url: record.pdfPreviewUrl,
  };
}
