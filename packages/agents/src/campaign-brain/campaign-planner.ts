/**
 * Campaign Planner
 *
 * Chooses the messaging angle and tone for a lead from its detected traits,
 * skipping angles that already failed for the same lead.
 *
 * @module campaign-brain/campaign-planner
 */

import type { CampaignTone, MessageType } from '@campaign-brain/lib';
import { CANONICAL_SEQUENCE } from '@campaign-brain/lib';
import type { CompanyRecord } from './contracts/campaign-input';
import { matchKeywords } from './text';
import { traitPriority } from './trait-detector';
import type { MemoryContext } from './types';

// ===========================================
// Angle Table
// ===========================================

export interface AngleEntry {
  messaging_angle: string;
  tone: CampaignTone;
  reasoning: string;
}

export const ANGLE_TABLE: Readonly<Record<string, AngleEntry>> = {
  role_ceo: {
    messaging_angle: 'competitive_advantage',
    tone: 'executive',
    reasoning: 'CEOs weigh market position and competitive differentiation',
  },
  role_cto: {
    messaging_angle: 'technical_innovation',
    tone: 'technical',
    reasoning: 'CTOs respond to technical depth and innovation',
  },
  senior_decision_maker: {
    messaging_angle: 'strategic_advantage',
    tone: 'executive',
    reasoning: 'Senior leaders focus on strategic outcomes',
  },
  enterprise: {
    messaging_angle: 'enterprise_transformation',
    tone: 'formal',
    reasoning: 'Enterprise buyers care about scale, risk and compliance',
  },
  startup: {
    messaging_angle: 'growth_acceleration',
    tone: 'dynamic',
    reasoning: 'Startups prioritize growth speed and efficiency',
  },
  agency: {
    messaging_angle: 'client_success',
    tone: 'professional',
    reasoning: 'Agencies are measured by client results',
  },
  saas: {
    messaging_angle: 'platform_optimization',
    tone: 'technical',
    reasoning: 'SaaS teams optimize platform performance and retention',
  },
  api_first: {
    messaging_angle: 'technical_excellence',
    tone: 'technical',
    reasoning: 'API-first companies value integration quality and developer experience',
  },
  ai_powered: {
    messaging_angle: 'innovation_leadership',
    tone: 'forward_thinking',
    reasoning: 'AI companies position themselves as innovation leaders',
  },
  fintech: {
    messaging_angle: 'security_compliance',
    tone: 'professional',
    reasoning: 'Fintech buyers lead with security and regulatory concerns',
  },
  healthtech: {
    messaging_angle: 'patient_outcomes',
    tone: 'professional',
    reasoning: 'Healthtech is judged on patient outcomes and compliance',
  },
  travel_tech: {
    messaging_angle: 'customer_experience',
    tone: 'engaging',
    reasoning: 'Travel companies compete on customer experience',
  },
};

export const DEFAULT_ANGLE: AngleEntry = {
  messaging_angle: 'general_value_proposition',
  tone: 'professional',
  reasoning: 'No mapped trait reached the planning threshold',
};

/**
 * Copy hints per angle, used by the copywriters
 */
export interface AngleProfile {
  focus: string;
  theme: string;
}

const GENERAL_PROFILE: AngleProfile = { focus: 'operational efficiency', theme: 'team productivity' };

const ANGLE_PROFILES: Readonly<Record<string, AngleProfile>> = {
  competitive_advantage: { focus: 'market differentiation', theme: 'competitive positioning' },
  technical_innovation: { focus: 'engineering velocity', theme: 'technical innovation' },
  strategic_advantage: { focus: 'strategic priorities', theme: 'strategic planning' },
  enterprise_transformation: { focus: 'large-scale modernization', theme: 'enterprise transformation' },
  growth_acceleration: { focus: 'efficient growth', theme: 'growth acceleration' },
  client_success: { focus: 'client retention', theme: 'client results' },
  platform_optimization: { focus: 'platform performance', theme: 'platform optimization' },
  technical_excellence: { focus: 'integration quality', theme: 'developer experience' },
  innovation_leadership: { focus: 'applied AI', theme: 'innovation leadership' },
  security_compliance: { focus: 'security and compliance', theme: 'regulatory readiness' },
  patient_outcomes: { focus: 'patient outcomes', theme: 'care delivery' },
  customer_experience: { focus: 'guest experience', theme: 'customer experience' },
  general_value_proposition: GENERAL_PROFILE,
};

export function angleProfile(angle: string): AngleProfile {
  return ANGLE_PROFILES[angle] ?? GENERAL_PROFILE;
}

// ===========================================
// Planning
// ===========================================

export interface PlanningInput {
  traits: readonly string[];
  trait_confidence: Readonly<Record<string, number>>;
  primary_trait: string | null;
  company: CompanyRecord;
  /** Any description, services, insights or scraped text beyond the name */
  has_research: boolean;
  memory: MemoryContext | null;
}

export interface PlanningOptions {
  /** Traits below this confidence never pick an angle */
  confidenceThreshold: number;
}

export interface CampaignPlan {
  /** Empty when no angle could be resolved */
  sequence: MessageType[];
  messaging_angle: string | null;
  tone: CampaignTone | null;
  reasoning: string;
  source_trait: string | null;
  /** "decision: reasoning" entries for the decision path */
  decisions: string[];
}

interface Candidate {
  trait: string;
  entry: AngleEntry;
}

/**
 * Mapped traits at or above the threshold: primary first, then by confidence × priority
 */
export function rankAngleCandidates(
  input: Pick<PlanningInput, 'traits' | 'trait_confidence' | 'primary_trait'>,
  confidenceThreshold: number
): Candidate[] {
  const eligible = (trait: string): AngleEntry | null => {
    const entry = ANGLE_TABLE[trait];
    const confidence = input.trait_confidence[trait] ?? 0;
    return entry && confidence >= confidenceThreshold ? entry : null;
  };

  const candidates: Candidate[] = [];

  const primary = input.primary_trait;
  const primaryEntry = primary ? eligible(primary) : null;
  if (primary && primaryEntry) {
    candidates.push({ trait: primary, entry: primaryEntry });
  }

  const weight = (trait: string) => (input.trait_confidence[trait] ?? 0) * traitPriority(trait);

  const others = input.traits
    .filter((trait) => trait !== primary)
    .flatMap((trait): Candidate[] => {
      const entry = eligible(trait);
      return entry ? [{ trait, entry }] : [];
    })
    .sort((a, b) => weight(b.trait) - weight(a.trait));

  return [...candidates, ...others];
}

const FORMAL_INDICATORS = ['enterprise', 'corporate', 'professional', 'institutional'];
const CASUAL_INDICATORS = ['friendly', 'approachable', 'easy', 'simple'];

/**
 * Adjust the angle's tone to how the company presents itself
 */
export function adaptTone(tone: CampaignTone, company: CompanyRecord): CampaignTone {
  const declared = company.tone?.toLowerCase() ?? '';

  if ((declared.includes('casual') || declared.includes('friendly')) && tone === 'formal') {
    return 'professional';
  }
  if ((declared.includes('formal') || declared.includes('corporate')) && tone === 'dynamic') {
    return 'professional';
  }

  const description = company.description.toLowerCase();
  const formal = matchKeywords(description, FORMAL_INDICATORS).length;
  const casual = matchKeywords(description, CASUAL_INDICATORS).length;

  if (formal > casual && (tone === 'dynamic' || tone === 'engaging')) {
    return 'professional';
  }
  if (casual > formal && tone === 'executive') {
    return 'professional';
  }

  return tone;
}

/**
 * Plan the campaign sequence, angle and tone.
 *
 * Returns an empty sequence when the lead has no traits and no research.
 */
export function planCampaign(input: PlanningInput, options: PlanningOptions): CampaignPlan {
  if (input.traits.length === 0 && !input.has_research) {
    return {
      sequence: [],
      messaging_angle: null,
      tone: null,
      reasoning: 'No traits detected and no company research to ground a messaging angle',
      source_trait: null,
      decisions: [],
    };
  }

  const decisions: string[] = [];
  const failedAngles = new Set(input.memory?.failed_angles ?? []);

  let chosen: Candidate | null = null;
  for (const candidate of rankAngleCandidates(input, options.confidenceThreshold)) {
    if (failedAngles.has(candidate.entry.messaging_angle)) {
      decisions.push(
        `skip_angle: ${candidate.entry.messaging_angle} from ${candidate.trait} failed in a previous run`
      );
      continue;
    }
    chosen = candidate;
    break;
  }

  const entry = chosen?.entry ?? DEFAULT_ANGLE;
  const tone = adaptTone(entry.tone, input.company);

  const reasoning = chosen
    ? `${entry.reasoning} (trait ${chosen.trait}, confidence ${input.trait_confidence[chosen.trait] ?? 0})`
    : entry.reasoning;

  decisions.push(`plan_campaign: angle ${entry.messaging_angle} with ${tone} tone`);
  if (tone !== entry.tone) {
    decisions.push(`adapt_tone: ${entry.tone} adjusted to ${tone} for company style`);
  }

  return {
    sequence: [...CANONICAL_SEQUENCE],
    messaging_angle: entry.messaging_angle,
    tone,
    reasoning,
    source_trait: chosen?.trait ?? null,
    decisions,
  };
}
