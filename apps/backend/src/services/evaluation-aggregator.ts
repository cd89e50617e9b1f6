import type { ImageStyle } from "../constants/styles.js";
import type { GenerationRecord } from "../types/models.js";

export type RecordSource = {
  listAll(): GenerationRecord[];
};

export type EvaluatedRecord = GenerationRecord & { score: number };

export type StyleAverages = Partial<Record<ImageStyle, number>>;

export type EvaluationReport = {
  totalRecords: number;
  evaluatedRecords: number;
  overallAverage: number | null;
  averageByStyle: StyleAverages;
  evaluations: EvaluatedRecord[];
};

export const isEvaluated = (record: GenerationRecord): record is EvaluatedRecord => record.score !== null;

const mean = (values: number[]) => values.reduce((sum, value) => sum + value, 0) / values.length;

export const averageScore = (records: GenerationRecord[]) => {
  const scores = records.filter(isEvaluated).map((record) => record.score);
  return scores.length > 0 ? mean(scores) : null;
};

export const averageScoreByStyle = (records: GenerationRecord[]): StyleAverages => {
  const scoresByStyle = new Map<ImageStyle, number[]>();
  for (const record of records.filter(isEvaluated)) {
    const scores = scoresByStyle.get(record.expectedStyle) ?? [];
    scores.push(record.score);
    scoresByStyle.set(record.expectedStyle, scores);
  }

  const averages: StyleAverages = {};
  for (const [style, scores] of scoresByStyle) {
    averages[style] = mean(scores);
  }
  return averages;
};

/** Read-only analytics over the stored history. */
export class EvaluationAggregator {
  constructor(private readonly source: RecordSource) {}

  overallAverage() {
    return averageScore(this.source.listAll());
  }

  averageByStyle() {
    return averageScoreByStyle(this.source.listAll());
  }

  report(): EvaluationReport {
    const records = this.source.listAll();
    const evaluations = records.filter(isEvaluated);
    return {
      totalRecords: records.length,
      evaluatedRecords: evaluations.length,
      overallAverage: averageScore(evaluations),
      averageByStyle: averageScoreByStyle(evaluations),
      evaluations
    };
  }
}
