/**
 * Spreadsheet import of catalog questions
 * Reads the first sheet of an .xlsx, .xls or .csv upload
 */

import * as XLSX from "xlsx";
import { z } from "zod";
import type { NewQuestion } from "../types/database";
import { validation } from "./errors";
import type { CatalogStore } from "./stores";

export const SUPPORTED_EXTENSIONS = ["xlsx", "xls", "csv"] as const;

const INSERT_BATCH_SIZE = 50;

export const COLUMNS = {
  serial: "Serial No",
  question: "QUESTION",
  options: "Options",
  correct: "Correct option",
  topic: "TAG",
  // Header as it appears in the question bank exports
  difficulty: "Difiiculty tag",
  source: "Source",
  qType: "q_type",
  solution: "Solution",
  image: "Image",
  solutionImage: "Solution Image",
} as const;

const blankToUndefined = (cell: unknown) =>
  cell === null || cell === undefined || String(cell).trim() === "" ? undefined : cell;

const requiredText = (column: string) =>
  z.preprocess(
    (cell) => (blankToUndefined(cell) === undefined ? "" : String(cell).trim()),
    z.string().min(1, `missing ${column}`)
  );

const optionalText = z.preprocess(
  (cell) => (blankToUndefined(cell) === undefined ? null : String(cell).trim()),
  z.string().nullable()
);

const toNumber = (cell: unknown) => {
  const value = blankToUndefined(cell);
  return value === undefined ? undefined : Number(value);
};

const integer = (column: string) =>
  z
    .number({
      required_error: `missing ${column}`,
      invalid_type_error: `${column} must be a number`,
    })
    .int(`${column} must be an integer`);

const rowSchema = z.object({
  ques_number: z.preprocess(
    toNumber,
    integer(COLUMNS.serial).positive(`${COLUMNS.serial} must be positive`)
  ),
  question: requiredText(COLUMNS.question),
  options: requiredText(COLUMNS.options),
  correct_answer: requiredText(COLUMNS.correct),
  topic: requiredText(COLUMNS.topic),
  difficulty: requiredText(COLUMNS.difficulty),
  source: requiredText(COLUMNS.source),
  q_type: z.preprocess(toNumber, integer(COLUMNS.qType).optional()),
  solution: optionalText,
  image: optionalText,
  solution_image: optionalText,
});

export type ImportOutcome =
  | { status: "success"; message: string }
  | { status: "partial_success" | "failed"; errors: string[]; valid_count: number };

export interface ParsedSheet {
  valid: NewQuestion[];
  errors: string[];
}

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot === -1 ? "" : fileName.slice(dot + 1).toLowerCase();
}

export function readSheetRows(data: Uint8Array, fileName: string): Record<string, unknown>[] {
  const extension = fileExtension(fileName);
  if (!SUPPORTED_EXTENSIONS.some((supported) => supported === extension)) {
    throw validation(`Unsupported file type: expected one of ${SUPPORTED_EXTENSIONS.join(", ")}`);
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: "array" });
  } catch (error) {
    throw validation(
      `Could not read spreadsheet: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const firstSheet = workbook.SheetNames[0];
  if (firstSheet === undefined) {
    throw validation("Spreadsheet has no sheets");
  }
  return XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[firstSheet], {
    defval: null,
  });
}

/**
 * Validate sheet rows. Row numbers in errors count the header as row 1.
 */
export function parseQuestionRows(rows: Record<string, unknown>[]): ParsedSheet {
  const valid: NewQuestion[] = [];
  const errors: string[] = [];

  rows.forEach((row, index) => {
    const parsed = rowSchema.safeParse({
      ques_number: row[COLUMNS.serial],
      question: row[COLUMNS.question],
      options: row[COLUMNS.options],
      correct_answer: row[COLUMNS.correct],
      topic: row[COLUMNS.topic],
      difficulty: row[COLUMNS.difficulty],
      source: row[COLUMNS.source],
      q_type: row[COLUMNS.qType],
      solution: row[COLUMNS.solution],
      image: row[COLUMNS.image],
      solution_image: row[COLUMNS.solutionImage],
    });

    if (!parsed.success) {
      const reasons = parsed.error.issues.map((issue) => issue.message).join("; ");
      errors.push(`Row ${index + 2}: ${reasons}`);
      return;
    }

    const record = parsed.data;
    valid.push({
      ques_number: record.ques_number,
      question: record.question,
      options: record.options,
      solution: record.solution ?? record.correct_answer,
      topic: record.topic,
      difficulty: record.difficulty,
      source: record.source,
      q_type: record.q_type ?? 0,
      correct_answer: record.correct_answer,
      image: record.image,
      solution_image: record.solution_image,
    });
  });

  return { valid, errors };
}

/**
 * Import every row or none: any invalid row stops the insert and is reported.
 */
export async function importQuestions(
  catalog: CatalogStore,
  rows: Record<string, unknown>[]
): Promise<ImportOutcome> {
  const { valid, errors } = parseQuestionRows(rows);

  if (errors.length > 0) {
    return {
      status: valid.length > 0 ? "partial_success" : "failed",
      errors,
      valid_count: valid.length,
    };
  }

  for (let i = 0; i < valid.length; i += INSERT_BATCH_SIZE) {
    await catalog.insertQuestions(valid.slice(i, i + INSERT_BATCH_SIZE));
  }

  return {
    status: "success",
    message: `Successfully imported ${valid.length} questions`,
  };
}
