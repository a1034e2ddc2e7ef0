import { OcrBlock, OcrBlockType } from './ocr-block.vo';

/**
 * Confidence Statistics Value Object
 * Aggregates the per-block confidence scores (0-100) reported by the OCR service
 */
export type ConfidenceBucket = '0-50' | '50-70' | '70-80' | '80-90' | '90-95' | '95-100';

export type ConfidenceDistribution = Readonly<Record<ConfidenceBucket, number>>;

export interface ConfidenceStatsProps {
  averageConfidence: number;
  minConfidence: number;
  maxConfidence: number;
  lowConfidenceBlocks: number;
  totalBlocks: number;
  distribution: Partial<Record<ConfidenceBucket, number>>;
}

const BUCKETS: ReadonlyArray<{ label: ConfidenceBucket; min: number; max: number }> = [
  { label: '0-50', min: 0, max: 50 },
  { label: '50-70', min: 50, max: 70 },
  { label: '70-80', min: 70, max: 80 },
  { label: '80-90', min: 80, max: 90 },
  { label: '90-95', min: 90, max: 95 },
  { label: '95-100', min: 95, max: 100 },
];

const SCORED_BLOCK_TYPES: ReadonlyArray<OcrBlockType> = [OcrBlockType.LINE, OcrBlockType.WORD];

export class ConfidenceStatsVO {
  static readonly DEFAULT_LOW_CONFIDENCE_THRESHOLD = 80;

  private constructor(private readonly props: ConfidenceStatsProps) {}

  static empty(): ConfidenceStatsVO {
    return new ConfidenceStatsVO({
      averageConfidence: 0,
      minConfidence: 0,
      maxConfidence: 0,
      lowConfidenceBlocks: 0,
      totalBlocks: 0,
      distribution: {},
    });
  }

  static fromBlocks(
    blocks: ReadonlyArray<OcrBlock>,
    threshold: number = ConfidenceStatsVO.DEFAULT_LOW_CONFIDENCE_THRESHOLD,
  ): ConfidenceStatsVO {
    const confidences: number[] = [];
    for (const block of blocks) {
      if (SCORED_BLOCK_TYPES.includes(block.blockType) && block.confidence !== undefined) {
        confidences.push(block.confidence);
      }
    }
    return ConfidenceStatsVO.fromScores(confidences, threshold);
  }

  static fromScores(
    confidences: ReadonlyArray<number>,
    threshold: number = ConfidenceStatsVO.DEFAULT_LOW_CONFIDENCE_THRESHOLD,
  ): ConfidenceStatsVO {
    if (confidences.length === 0) {
      return ConfidenceStatsVO.empty();
    }

    let sum = 0;
    let lowest = Infinity;
    let highest = -Infinity;
    let low = 0;
    const distribution: Record<ConfidenceBucket, number> = {
      '0-50': 0,
      '50-70': 0,
      '70-80': 0,
      '80-90': 0,
      '90-95': 0,
      '95-100': 0,
    };

    for (const value of confidences) {
      sum += value;
      lowest = Math.min(lowest, value);
      highest = Math.max(highest, value);
      if (value < threshold) {
        low++;
      }

      const bucket = BUCKETS.find(
        ({ label, min, max }) => value >= min && (value < max || (label === '95-100' && value <= max)),
      );
      if (bucket) {
        distribution[bucket.label]++;
      }
    }

    return new ConfidenceStatsVO({
      averageConfidence: sum / confidences.length,
      minConfidence: lowest,
      maxConfidence: highest,
      lowConfidenceBlocks: low,
      totalBlocks: confidences.length,
      distribution,
    });
  }

  get averageConfidence(): number {
    return this.props.averageConfidence;
  }

  get minConfidence(): number {
    return this.props.minConfidence;
  }

  get maxConfidence(): number {
    return this.props.maxConfidence;
  }

  get lowConfidenceBlocks(): number {
    return this.props.lowConfidenceBlocks;
  }

  get totalBlocks(): number {
    return this.props.totalBlocks;
  }

  get distribution(): Partial<Record<ConfidenceBucket, number>> {
    return { ...this.props.distribution };
  }

  get lowConfidenceRatio(): number {
    return this.props.lowConfidenceBlocks / Math.max(this.props.totalBlocks, 1);
  }

  isHighQuality(minAverageConfidence = 85, maxLowConfidenceRatio = 0.1): boolean {
    return (
      this.props.averageConfidence >= minAverageConfidence &&
      this.lowConfidenceRatio < maxLowConfidenceRatio
    );
  }

  toJSON() {
    return {
      averageConfidence: round(this.props.averageConfidence),
      minConfidence: round(this.props.minConfidence),
      maxConfidence: round(this.props.maxConfidence),
      lowConfidenceBlocks: this.props.lowConfidenceBlocks,
      totalBlocks: this.props.totalBlocks,
      distribution: this.distribution,
    };
  }
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
