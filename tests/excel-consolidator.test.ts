import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { after, test } from "node:test";
import { ExcelConsolidator, OUTPUT_FILE_PREFIX, formatTimestamp } from "../src/lib/excel-consolidator";
import {
  ConfigurationError,
  FileNotFoundError,
  InvalidSheetNameError,
  MissingDestinationColumnsError,
  PreconditionError,
  SheetNotFoundError
} from "../src/lib/excel-errors";
import type { ConsolidatorConfigInput } from "../src/lib/consolidator-settings";
import type { CellMapTable } from "../src/lib/excel-cell-map-table";
import { cellText } from "../src/lib/excel-helpers";
import type { ProgressEvent } from "../src/lib/excel-types";
import {
  cellAt,
  consolidationRows,
  createRecordingLogger,
  makeTempDir,
  readWorkbookFile,
  removeDir,
  writeWorkbookFile
} from "./helpers/workbooks";
import type { SheetRows } from "./helpers/workbooks";

const SHEET = "General Consolidation";
const FIXED_NOW = () => new Date(2026, 0, 15, 9, 5, 3);
const OUTPUT_NAME = "Consolidation_AutoLinked_20260115_090503.xlsx";

const tempDirs: string[] = [];
after(() => tempDirs.forEach(removeDir));

type Fixture = {
  dir: string;
  config: ConsolidatorConfigInput;
  estimates: string[];
};

function setupFixture(options: { header?: string[]; dataRows?: SheetRows; headerRow?: number } = {}): Fixture {
  const dir = makeTempDir();
  tempDirs.push(dir);
  const headerRow = options.headerRow ?? 4;

  const cellMapPath = writeWorkbookFile(dir, "Cell Map.xlsx", {
    Mappings: [
      ["Source Sheet", "Source Cell", "Destination Column (Consolidation)"],
      ["Sheet1", "B2", "Cost"],
      ["Summary", "C4", "Tax"]
    ]
  });
  const consolidationPath = writeWorkbookFile(dir, "consolidation.xlsx", {
    Cover: [["Estimate summary"]],
    [SHEET]: consolidationRows(headerRow, options.header ?? ["File", "Item", "Cost", "Tax", "Notes"], options.dataRows)
  });
  const estimates = ["est1.xlsx", "est2.xlsx"].map((name, i) =>
    writeWorkbookFile(dir, name, {
      Sheet1: [["Label", "Amount"], ["Total", 100 * (i + 1)]],
      Summary: [["x"], [], [], ["", "", 10 * (i + 1)]]
    })
  );

  return {
    dir,
    config: { cellMapPath, consolidationPath, headerRow, dataStartRow: headerRow + 1 },
    estimates
  };
}

function outputFiles(dir: string): string[] {
  return fs.readdirSync(dir).filter((name) => name.startsWith(OUTPUT_FILE_PREFIX)).sort();
}

test("formatTimestamp renders local time as YYYYMMDD_HHMMSS", () => {
  assert.equal(formatTimestamp(new Date(2026, 0, 15, 9, 5, 3)), "20260115_090503");
  assert.equal(formatTimestamp(new Date(2025, 11, 31, 23, 59, 59)), "20251231_235959");
});

test("consolidate links every estimate into a new timestamped workbook", async () => {
  const { dir, config, estimates } = setupFixture({
    dataRows: [
      ["stale1", 7, 1, 2, "note"],
      ["stale2", 8, 1, 2],
      ["stale3", 9, 1, 2]
    ]
  });
  const originalBytes = fs.readFileSync(config.consolidationPath);
  const logger = createRecordingLogger();
  const events: ProgressEvent[] = [];

  const consolidator = await ExcelConsolidator.create(config, { logger, now: FIXED_NOW });
  const outputPath = await consolidator.consolidate(estimates, (event) => events.push(event));

  assert.equal(outputPath, path.join(dir, OUTPUT_NAME));
  assert.equal(consolidator.state, "done");
  assert.ok(fs.readFileSync(config.consolidationPath).equals(originalBytes));

  const output = readWorkbookFile(outputPath);
  assert.deepEqual(output.SheetNames, ["Cover", SHEET]);
  const sheet = output.Sheets[SHEET];
  assert.equal(cellAt(sheet, "A4")?.v, "File");
  assert.equal(cellAt(sheet, "A5")?.v, "est1");
  assert.equal(cellAt(sheet, "B5")?.v, 1);
  assert.equal(cellAt(sheet, "C5")?.f, `'${dir}\\[est1.xlsx]Sheet1'!B2`);
  assert.equal(cellAt(sheet, "D5")?.f, `'${dir}\\[est1.xlsx]Summary'!C4`);
  assert.equal(cellAt(sheet, "E5")?.v, "note");
  assert.equal(cellAt(sheet, "A6")?.v, "est2");
  assert.equal(cellAt(sheet, "B6")?.v, 2);
  assert.equal(cellAt(sheet, "C6")?.f, `'${dir}\\[est2.xlsx]Sheet1'!B2`);
  assert.equal(cellText(cellAt(sheet, "A7")), "");
  assert.equal(cellText(cellAt(sheet, "C7")), "");

  assert.deepEqual(events, [
    { phase: "validation", current: 0, total: 2, message: "Validating 2 estimate file(s)..." },
    { phase: "validation", current: 1, total: 2, message: "Validated est1.xlsx" },
    { phase: "validation", current: 2, total: 2, message: "Validated est2.xlsx" },
    { phase: "clearing", current: 0, total: 2, message: "Clearing existing data..." },
    { phase: "clearing", current: 2, total: 2, message: "Clearing complete." },
    { phase: "processing", current: 1, total: 2, message: "Processed est1.xlsx (Item #1)" },
    { phase: "processing", current: 2, total: 2, message: "Processed est2.xlsx (Item #2)" },
    { phase: "saving", current: 0, total: 1, message: "Saving consolidated file..." },
    { phase: "saving", current: 1, total: 1, message: `Saved ${OUTPUT_NAME}` }
  ]);
  assert.ok(logger.lines.some((line) => line.message === "Cell Map validated successfully: 2 mappings loaded"));
  assert.ok(logger.lines.some((line) => line.message === `Consolidation completed: ${outputPath}`));
});

test("a second run writes a suffixed file with the same rows", async () => {
  const { dir, config, estimates } = setupFixture({ dataRows: [["stale", 3, 1, 1]] });
  const consolidator = await ExcelConsolidator.create(config, { logger: createRecordingLogger(), now: FIXED_NOW });

  const first = await consolidator.consolidate(estimates);
  const second = await consolidator.consolidate(estimates);

  assert.equal(path.basename(second), "Consolidation_AutoLinked_20260115_090503_1.xlsx");
  assert.deepEqual(outputFiles(dir), [OUTPUT_NAME, "Consolidation_AutoLinked_20260115_090503_1.xlsx"]);

  const a = readWorkbookFile(first).Sheets[SHEET];
  const b = readWorkbookFile(second).Sheets[SHEET];
  for (const ref of ["C5", "D5", "C6", "D6"]) {
    assert.notEqual(cellAt(a, ref)?.f, undefined, ref);
  }
  assert.equal(cellAt(b, "C6")?.f, `'${dir}\\[est2.xlsx]Sheet1'!B2`);
  for (const ref of ["A5", "B5", "C5", "D5", "A6", "B6", "C6", "D6"]) {
    assert.equal(cellAt(b, ref)?.v, cellAt(a, ref)?.v, ref);
    assert.equal(cellAt(b, ref)?.f, cellAt(a, ref)?.f, ref);
  }
});

test("rows follow the order the estimate files were given in", async () => {
  const { dir, config, estimates } = setupFixture();
  const consolidator = await ExcelConsolidator.create(config, { logger: createRecordingLogger(), now: FIXED_NOW });

  const outputPath = await consolidator.consolidate([...estimates].reverse());

  const sheet = readWorkbookFile(outputPath).Sheets[SHEET];
  assert.equal(cellAt(sheet, "A5")?.v, "est2");
  assert.equal(cellAt(sheet, "B5")?.v, 1);
  assert.equal(cellAt(sheet, "C5")?.f, `'${dir}\\[est2.xlsx]Sheet1'!B2`);
  assert.equal(cellAt(sheet, "A6")?.v, "est1");
});

test("estimates are linked under the same sanitized path they were validated under", async () => {
  const { dir, config } = setupFixture();
  fs.mkdirSync(path.join(dir, "sub"));
  writeWorkbookFile(dir, path.join("sub", "est1.xlsx"), {
    Sheet1: [["Label", "Amount"], ["Total", 900]],
    Summary: [["x"]]
  });
  const traversal = `${dir}${path.sep}sub${path.sep}..${path.sep}est1.xlsx`;
  const events: ProgressEvent[] = [];
  const consolidator = await ExcelConsolidator.create(config, { logger: createRecordingLogger(), now: FIXED_NOW });

  await consolidator.validateCellMap();
  assert.equal(await consolidator.validateEstimateFile(traversal), path.join(dir, "sub", "est1.xlsx"));

  const outputPath = await consolidator.consolidate([traversal], (event) => events.push(event));
  const expected = `'${path.join(dir, "sub")}\\[est1.xlsx]Sheet1'!B2`;
  assert.equal(cellAt(readWorkbookFile(outputPath).Sheets[SHEET], "C5")?.f, expected);
  assert.equal(events[1].message, "Validated est1.xlsx");

  const direct = await consolidator.runConsolidation([traversal]);
  assert.equal(path.basename(direct), "Consolidation_AutoLinked_20260115_090503_1.xlsx");
  assert.equal(cellAt(readWorkbookFile(direct).Sheets[SHEET], "C5")?.f, expected);
});

test("existing rows are kept when clearing is turned off", async () => {
  const { config, estimates } = setupFixture({
    dataRows: [
      ["stale1", 7, 1, 2],
      ["stale2", 8, 1, 2],
      ["stale3", 9, 1, 2]
    ]
  });
  const events: ProgressEvent[] = [];
  const consolidator = await ExcelConsolidator.create(
    { ...config, clearExistingData: false },
    { logger: createRecordingLogger(), now: FIXED_NOW }
  );

  const outputPath = await consolidator.consolidate(estimates, (event) => events.push(event));

  const sheet = readWorkbookFile(outputPath).Sheets[SHEET];
  assert.equal(cellAt(sheet, "A5")?.v, "est1");
  assert.equal(cellAt(sheet, "A7")?.v, "stale3");
  assert.equal(cellAt(sheet, "B7")?.v, 9);
  assert.equal(events.some((event) => event.phase === "clearing"), false);
});

test("custom header and data start rows are honoured", async () => {
  const { config, estimates } = setupFixture({ headerRow: 2 });
  const consolidator = await ExcelConsolidator.create(config, { logger: createRecordingLogger(), now: FIXED_NOW });

  const sheet = readWorkbookFile(await consolidator.consolidate(estimates.slice(0, 1))).Sheets[SHEET];
  assert.equal(cellAt(sheet, "A3")?.v, "est1");
  assert.equal(cellAt(sheet, "B3")?.v, 1);
});

test("stages refuse to run before the cell map is validated", async () => {
  const { config, estimates } = setupFixture();
  const consolidator = await ExcelConsolidator.create(config, { logger: createRecordingLogger() });

  assert.equal<CellMapTable | null>(consolidator.cellMapTable, null);
  await assert.rejects(consolidator.runConsolidation(estimates), {
    name: "PreconditionError",
    message: "Cell Map must be validated first before running consolidation"
  });
  await assert.rejects(consolidator.validateConsolidationFile(), {
    name: "PreconditionError",
    message: "Cell Map must be validated first before validating consolidation file"
  });
  await assert.rejects(consolidator.validateEstimateFile(estimates[0]), PreconditionError);

  await consolidator.validateCellMap();
  assert.equal(consolidator.cellMapTable?.rowCount, 2);
  await consolidator.validateConsolidationFile();
  assert.equal(await consolidator.validateEstimateFile(estimates[0]), estimates[0]);
  assert.equal(consolidator.state, "idle");
});

test("consolidate needs at least one estimate file", async () => {
  const { config } = setupFixture();
  const consolidator = await ExcelConsolidator.create(config, { logger: createRecordingLogger() });
  await assert.rejects(consolidator.consolidate([]), { name: "PreconditionError", message: "No estimate files selected." });
});

test("a missing destination column fails validation without writing output", async () => {
  const { dir, config, estimates } = setupFixture({ header: ["File", "Item", "Cost"] });
  const events: ProgressEvent[] = [];
  const consolidator = await ExcelConsolidator.create(config, { logger: createRecordingLogger(), now: FIXED_NOW });

  await assert.rejects(consolidator.consolidate(estimates, (event) => events.push(event)), (error: unknown) => {
    assert.ok(error instanceof MissingDestinationColumnsError);
    assert.equal(error.message, "Missing destination columns in consolidation sheet (row 4): Tax");
    return true;
  });
  assert.equal(consolidator.state, "failed");
  assert.deepEqual(events, []);
  assert.deepEqual(outputFiles(dir), []);
});

test("an estimate without a mapped sheet fails validation without writing output", async () => {
  const { dir, config, estimates } = setupFixture();
  const broken = writeWorkbookFile(dir, "est3.xlsx", { Sheet1: [["only"]] });
  const consolidator = await ExcelConsolidator.create(config, { logger: createRecordingLogger(), now: FIXED_NOW });

  await assert.rejects(consolidator.consolidate([...estimates, broken]), (error: unknown) => {
    assert.ok(error instanceof SheetNotFoundError);
    assert.equal(error.message, "In file 'est3.xlsx', required sheet 'Summary' not found. Available sheets: [Sheet1]");
    return true;
  });
  assert.deepEqual(outputFiles(dir), []);
});

test("a missing estimate file is reported by path", async () => {
  const { dir, config } = setupFixture();
  const consolidator = await ExcelConsolidator.create(config, { logger: createRecordingLogger() });
  const missing = path.join(dir, "est9.xlsx");

  await assert.rejects(consolidator.consolidate([missing]), {
    name: "FileNotFoundError",
    message: `Estimate not found: ${missing}`
  });
});

test("create rejects bad configuration before touching any workbook", async () => {
  const { dir, config } = setupFixture();

  await assert.rejects(ExcelConsolidator.create({ ...config, headerRow: 5, dataStartRow: 5 }), {
    name: "ConfigurationError",
    message: "Data start row must be after the header row"
  });
  await assert.rejects(ExcelConsolidator.create({ ...config, headerRow: 0 }), ConfigurationError);
  await assert.rejects(
    ExcelConsolidator.create({ ...config, consolidationSheetName: "Bad/Name" }, { logger: createRecordingLogger() }),
    InvalidSheetNameError
  );
  await assert.rejects(
    ExcelConsolidator.create({ ...config, cellMapPath: path.join(dir, "nope.xlsx") }),
    (error: unknown) => {
      assert.ok(error instanceof FileNotFoundError);
      assert.equal(error.message, `Cell Map not found: ${path.join(dir, "nope.xlsx")}`);
      return true;
    }
  );
});

test("a missing consolidation sheet is reported with the sheets that exist", async () => {
  const { config, estimates } = setupFixture();
  const consolidator = await ExcelConsolidator.create(
    { ...config, consolidationSheetName: "Totals" },
    { logger: createRecordingLogger() }
  );

  await assert.rejects(consolidator.consolidate(estimates), {
    name: "SheetNotFoundError",
    message: `Sheet 'Totals' not found. Available sheets: [Cover, ${SHEET}]`
  });
});
