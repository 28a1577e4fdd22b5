import path from "node:path";

export const getRunDir = (outputDir: string, runId: string): string =>
  path.join(outputDir, "crop-runs", runId);

export const getRunLogDir = (runDir: string): string => path.join(runDir, "logs");

export const getRunReportPath = (runDir: string): string => path.join(runDir, "report.json");

export const getRenderCopyPath = (tempDir: string): string => path.join(tempDir, "render-copy.pdf");

export const getPageImageRoot = (tempDir: string, pageIndex: number): string =>
  path.join(tempDir, `page-${String(pageIndex + 1).padStart(4, "0")}`);
