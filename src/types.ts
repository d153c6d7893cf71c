export interface ChatMessage { role: 'system' | 'user' | 'assistant'; content: string; }

export type NodeKind = 'Disease' | 'Symptom' | 'Solution' | 'Other';

export interface GraphNode {
  id: string;
  kind: NodeKind;
  type: string;                    // raw snapshot type, kept for schema()
  name: string;
  description: string;
  extra: Record<string, string>;
}

export interface GraphRelationship {
  source: string;
  target: string;
  kind: string;
}

export interface GraphSchema {
  nodeTypes: string[];
  relationshipTypes: string[];
  nodeCounts: { type: string; count: number }[];
}

export interface CandidateDisease {
  name: string;
  description: string;
  allSymptoms: string[];
  matchedSymptoms: string[];
  matchCount: number;
  totalSymptoms: number;
  matchPercentage: number;
}

export interface DifferentiatorCandidate {
  symptom: string;
  diseases: string[];
  score: number;
}

export interface Solution {
  name: string;
  description: string;
  treatment: string;
}

export type StopReason = 'definitive' | 'clear_lead' | 'strong_match' | 'sufficient_evidence' | 'no_more_questions';

export interface DiagnosisRecord {
  disease: string;
  matchPercentage: number;
  reason: StopReason;
  text: string;
}

export interface ConversationState {
  id: string;                                // session id
  stage: 'collecting' | 'diagnosed';
  turn: number;
  confirmed: string[];
  ruledOut: string[];
  asked: string[];
  lastAsked: string | null;
  candidateDiseases: CandidateDisease[];
  history: ChatMessage[];
  diagnosis: DiagnosisRecord | null;
}

export interface StateView {
  stage: ConversationState['stage'];
  turn: number;
  confirmed: string[];
  ruledOut: string[];
  asked: string[];
  candidateDiseases: CandidateDisease[];
}

export type TurnResult =
  | { status: 'question'; stage: 'collecting'; message: string; symptom: string }
  | { status: 'diagnosis'; stage: 'diagnosed'; message: string; diagnosis: DiagnosisRecord }
  | { status: 'need_more_info'; stage: 'collecting'; message: string }
  | { status: 'already_diagnosed'; stage: 'diagnosed'; message: string; diagnosis: DiagnosisRecord | null }
  | { status: 'error'; stage: ConversationState['stage']; message: string };
