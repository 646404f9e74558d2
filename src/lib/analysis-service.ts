import { randomUUID } from 'node:crypto';
import { capturePage } from './crawler';
import { env } from './env';
import { extractHtmlFeatures } from './analyzers/html-analyzer';
import { estimateImageFeatures } from './analyzers/image-analyzer';
import { analyzeHeuristics, serializeReport } from './analyzers/scoring';
import { classifySummary } from './analyzers/summary';
import { AnalysisPhase, AnalysisResult, DEVICE_PROFILES, DeviceType, PageCapture } from './types';

export interface AnalyzeOptions {
  onPhase?: (phase: AnalysisPhase, detail: string) => void;
}

function logPhase(phase: AnalysisPhase, detail: string) {
  if (env.verboseLogs) {
    console.info(`[analysis] ${phase}: ${detail}`);
  }
}

export async function analyzeWebsite(
  url: string,
  deviceType: DeviceType,
  options: AnalyzeOptions = {},
): Promise<AnalysisResult> {
  const start = Date.now();
  const phase = (name: AnalysisPhase, detail: string) => {
    logPhase(name, detail);
    options.onPhase?.(name, detail);
  };

  phase('capturing', `Fetching ${url} as ${deviceType}`);
  let capture: PageCapture;
  try {
    capture = await capturePage(url, deviceType);
  } catch (error) {
    console.error(`[analysis] capture failed for ${url}:`, error);
    throw error;
  }

  phase('extracting-html', 'Reading page structure');
  const htmlFeatures = extractHtmlFeatures(capture.html, capture.url);

  phase('extracting-image', 'Estimating visual signals');
  const imageFeatures = estimateImageFeatures(DEVICE_PROFILES[deviceType]);

  phase('scoring', 'Applying usability rules');
  const report = analyzeHeuristics({ html: htmlFeatures, image: imageFeatures });
  const payload = serializeReport(report);

  return {
    analysis_id: randomUUID(),
    url: capture.url,
    device_type: deviceType,
    timestamp: new Date().toISOString(),
    page_title: capture.title,
    analysis_time: (Date.now() - start) / 1000,
    ...payload,
    summary: classifySummary({
      totalScore: report.totalScore,
      categories: report.categories,
      recommendations: report.recommendations,
    }),
    html_analysis: htmlFeatures,
    image_analysis: imageFeatures,
  };
}
