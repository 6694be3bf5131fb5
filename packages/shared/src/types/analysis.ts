export interface RecognizedEntity {
  text: string;
  type: string;
  confidence: number;
  context?: string;
}

export interface SubjectDescriptor {
  text: string;
  category: "behavior" | "trait";
  confidence?: number;
}

export interface KeyInsights {
  skillsAndCompetencies?: string[];
  mainThemes?: string[];
  goalsAndAspirations?: string[];
}

export interface FileAnalysis {
  customerName?: string;
  contentType?: string;
  rawText?: string;
  confidence?: number;
  entities?: RecognizedEntity[];
  keyInsights?: KeyInsights;
  descriptors?: SubjectDescriptor[];
}

export interface NeedsAnalysis {
  subjectName?: string;
  confidence?: number;
  needsScores?: Record<string, number>;
  dominantNeeds?: Array<[string, number]>;
  behavioralPatterns?: string[];
  personalityTraits?: string[];
  lifeThemes?: string[];
  evidence?: Record<string, string[]>;
}

export interface ExtractionRequest {
  customerId: string;
  extractionId: string;
  fileAnalysis: FileAnalysis;
  needsAnalysis: NeedsAnalysis;
}
