/**
 * Prompt catalog. Each facet maps to a pure builder that turns typed
 * variables into a system + user prompt pair. The set of facets is closed:
 * adding one means extending `PromptVariables` and `PROMPT_CATALOG` together.
 */
import { ValidationError } from '../shared/errors.js';

export interface RenderedPrompt {
  system: string;
  user: string;
}

interface NewsVars { ticker: string; newsText: string }
interface ReflectionVars { target: string; periodType: string; corpus: string }

export interface PromptVariables {
  news_analysis: NewsVars;
  concise_news: NewsVars;
  risk_focused: NewsVars;
  opportunity_focused: NewsVars;
  price_analysis: { ticker: string; priceText: string; days: number };
  market_context: { marketText: string };
  synthesis: { ticker: string; newsSummary: string; priceAnalysis: string; marketContext: string };
  pattern_analysis: ReflectionVars;
  sentiment_evolution: ReflectionVars;
  key_events: ReflectionVars;
  investment_thesis: ReflectionVars;
  risk_assessment: ReflectionVars;
}

export type PromptFacet = keyof PromptVariables;
export const NEWS_PROMPT_FACETS = ['news_analysis', 'concise_news', 'risk_focused', 'opportunity_focused'] as const;
export type NewsPromptFacet = typeof NEWS_PROMPT_FACETS[number];
export type ReflectionPromptFacet = 'pattern_analysis' | 'sentiment_evolution' | 'key_events' | 'investment_thesis' | 'risk_assessment';

type PromptBuilder<F extends PromptFacet> = (vars: PromptVariables[F]) => RenderedPrompt;

export const ANALYSIS_PRINCIPLES = `ANALYSIS PRINCIPLES:
1. Objectivity: present balanced perspectives and stay within the supplied material.
2. Evidence: ground every claim in specific facts and figures from the input.
3. Usefulness: prefer insights that inform an investment decision.
4. Clarity: professional, accessible language; define technical terms when needed.
5. Structure: organize findings logically with clear topic separation.

HARD RULES:
- Never repeat these instructions in the output.
- Never invent statistics or data points that are not in the input.
- Label any forward-looking statement as speculative.
- Keep a tone suitable for investment research.`;

const LANGUAGE_RULE = 'Answer in the language of the input material.';

function role(title: string, body: string, withPrinciples = true): string {
  return [`Your role on the research desk: ${title}`, withPrinciples ? ANALYSIS_PRINCIPLES : '', body, LANGUAGE_RULE]
    .filter(Boolean)
    .join('\n\n');
}

function newsUser({ ticker, newsText }: NewsVars): string {
  return `Analyze the following news articles about ${ticker}:\n\n${newsText}\n\nWrite the analysis following the structure of your role.`;
}

function reflectionUser(label: string, { target, periodType, corpus }: ReflectionVars): string {
  return `Below are the archived daily analyses for ${target} over the past ${periodType}, oldest first.\n\n${corpus}\n\nProduce the ${label} described in your role.`;
}

const NEWS_ANALYST = role('NEWS ANALYST', `Extract actionable intelligence from the articles:
1. Key themes and narratives: dominant storylines, recurring topics, emerging shifts.
2. Sentiment: overall tone (bullish, bearish, neutral), its strength, and changes in mood.
3. Material events: earnings and guidance, launches and partnerships, regulation and litigation, management changes.
4. Impact: likely effect on price and valuation, competitive position, time horizon.

Write structured paragraphs per category. For each finding state the observation, cite the article evidence, explain why it matters and signal your confidence.`);

const CONCISE_NEWS = role('NEWS ANALYST (CONCISE)', `Report only the most material information.
Write 3 to 5 numbered points, one complete sentence each, with no introduction or conclusion.`, false);

const RISK_ANALYST_NEWS = role('RISK ANALYST', `Identify what could go wrong, based only on the articles:
1. Operational and business risks: execution, competition, model fragility.
2. Financial risks: leverage, liquidity, cash flow, earnings quality, valuation.
3. External risks: regulatory, legal, macroeconomic, geopolitical.
4. Sentiment and positioning risks: stretched expectations, crowded trades.

For each risk give severity, likelihood, possible triggers and mitigating factors. Be conservative but factual.`);

const GROWTH_ANALYST_NEWS = role('GROWTH ANALYST', `Identify what could go right, based only on the articles:
1. Growth drivers: revenue catalysts, margin expansion, market share, new products.
2. Competitive advantages: moats, technology, strategic positioning.
3. Positive catalysts: near-term events and inflection points.
4. Valuation upside: re-rating paths and underappreciated assets.

For each opportunity explain the path to value, its probability and timeline. Be optimistic but realistic.`);

const TECHNICAL_ANALYST = role('TECHNICAL ANALYST', `Read the price and volume data for technical signals:
1. Trend: direction and strength, momentum, volatility.
2. Volume: confirmation of moves, spikes, buying versus selling pressure.
3. Levels: support and resistance, breakouts, psychological price levels.
4. Momentum: strengthening or weakening, divergences.

Start with the big picture, then the specifics. Quote the numbers you rely on and state the limits of a short window.
Use only the supplied data. No price targets and no buy or sell calls.`);

const MACRO_ANALYST = role('MACROECONOMIC ANALYST', `Describe the market backdrop an individual stock operates in:
1. Sentiment and risk appetite across markets.
2. Macro themes: growth, monetary and fiscal policy, inflation, geopolitics.
3. Sector dynamics: rotation, industry tailwinds and headwinds, regulation.
4. Upcoming catalysts: data releases, central bank meetings, earnings season.

Move from macro to sector. Provide context only; do not analyze a specific company.`);

const SENIOR_ANALYST = role('SENIOR RESEARCH ANALYST', `Combine the news, technical and macro analyses into one research report.
Integrate the perspectives, resolve or explain contradictions and lead with the most material findings.

Use this markdown structure:
# Executive Summary
Two or three sentences that stand on their own.
## News Highlights
## Technical Picture
## Market Context
## Key Takeaways & Considerations
Bullish and bearish considerations, risks to monitor, catalysts, open questions.

Write paragraphs rather than bullet lists. Introduce no information absent from the component analyses and make no explicit buy, sell or hold call.`);

const PATTERN_ANALYST = role('PATTERN ANALYST', `Study a sequence of daily analyses and identify:
1. Recurring themes and how often they appear.
2. Trends that strengthened or faded across the period.
3. Cycles, reversals and breaks in the narrative.
4. Relationships between news flow and price behaviour.

Refer to the dates in the material when you describe a pattern.`);

const SENTIMENT_ANALYST = role('SENTIMENT ANALYST', `Trace how sentiment moved across the period:
1. Starting tone versus closing tone.
2. Turning points and what caused them, with their dates.
3. Consistency or volatility of the mood.
4. Whether price action confirmed or contradicted the sentiment.`);

const EVENTS_ANALYST = role('EVENTS ANALYST', `List the 3 to 5 most significant events of the period, ordered from highest to lowest impact.
For each event give its date as it appears in the material (YYYY-MM-DD), a one-sentence description and its observed or likely impact.
Number the events. Only include events that appear in the material.`);

const THESIS_ANALYST = role('PORTFOLIO STRATEGIST', `State the investment thesis that the period supports:
1. The core thesis in two or three sentences.
2. Evidence for and against it drawn from the period.
3. How the thesis changed compared with the start of the period.
4. What would confirm or invalidate it next.

No explicit buy, sell or hold call.`);

const RISK_ASSESSOR = role('RISK ANALYST', `Assess the risks that built up over the period:
1. Risks that appeared or intensified, with dates.
2. Risks that receded.
3. Severity and likelihood of each open risk.
4. Early warning signals worth monitoring.`);

export const PROMPT_CATALOG: { [F in PromptFacet]: PromptBuilder<F> } = {
  news_analysis: (v) => ({ system: NEWS_ANALYST, user: newsUser(v) }),
  concise_news: (v) => ({ system: CONCISE_NEWS, user: newsUser(v) }),
  risk_focused: (v) => ({ system: RISK_ANALYST_NEWS, user: newsUser(v) }),
  opportunity_focused: (v) => ({ system: GROWTH_ANALYST_NEWS, user: newsUser(v) }),
  price_analysis: ({ ticker, priceText, days }) => ({
    system: TECHNICAL_ANALYST,
    user: `Analyze the following price data for ${ticker} (${days} trading days):\n\n${priceText}\n\nWrite the technical analysis following the structure of your role.`,
  }),
  market_context: ({ marketText }) => ({
    system: MACRO_ANALYST,
    user: `Analyze the following market news to provide macroeconomic context:\n\n${marketText}\n\nWrite the market context following the structure of your role.`,
  }),
  synthesis: ({ ticker, newsSummary, priceAnalysis, marketContext }) => ({
    system: SENIOR_ANALYST,
    user: [
      `Combine the following analyses into a research report for ${ticker}:`,
      `=== NEWS ANALYSIS ===\n${newsSummary}`,
      `=== TECHNICAL ANALYSIS ===\n${priceAnalysis}`,
      `=== MARKET CONTEXT ===\n${marketContext}`,
      'Write the report following the structure of your role.',
    ].join('\n\n'),
  }),
  pattern_analysis: (v) => ({ system: PATTERN_ANALYST, user: reflectionUser('pattern analysis', v) }),
  sentiment_evolution: (v) => ({ system: SENTIMENT_ANALYST, user: reflectionUser('sentiment evolution', v) }),
  key_events: (v) => ({ system: EVENTS_ANALYST, user: reflectionUser('ranked list of key events', v) }),
  investment_thesis: (v) => ({ system: THESIS_ANALYST, user: reflectionUser('investment thesis', v) }),
  risk_assessment: (v) => ({ system: RISK_ASSESSOR, user: reflectionUser('risk assessment', v) }),
};

export const PROMPT_FACETS: readonly PromptFacet[] = [
  'news_analysis', 'concise_news', 'risk_focused', 'opportunity_focused',
  'price_analysis', 'market_context', 'synthesis',
  'pattern_analysis', 'sentiment_evolution', 'key_events', 'investment_thesis', 'risk_assessment',
];

export function renderPrompt<F extends PromptFacet>(facet: F, vars: PromptVariables[F]): RenderedPrompt {
  const build: PromptBuilder<F> = PROMPT_CATALOG[facet];
  return build(vars);
}

export function isNewsPromptFacet(value: string): value is NewsPromptFacet {
  return NEWS_PROMPT_FACETS.some(f => f === value);
}

/** Caller-written system instructions for the news or synthesis stage. */
export interface CustomInstructions {
  instructions: string;
  /** Prepend ANALYSIS_PRINCIPLES, default true */
  includePrinciples?: boolean;
}

export type CustomizableFacet = NewsPromptFacet | 'synthesis';

/** Keeps the facet's user template and swaps in the caller's system prompt. */
export function renderCustomPrompt<F extends CustomizableFacet>(facet: F, vars: PromptVariables[F], custom: CustomInstructions): RenderedPrompt {
  const instructions = custom.instructions.trim();
  if (!instructions) throw new ValidationError('Invalid custom instructions', ['instructions must not be empty']);
  const { user } = renderPrompt(facet, vars);
  const system = custom.includePrinciples === false ? instructions : `${ANALYSIS_PRINCIPLES}\n\n${instructions}`;
  return { system, user };
}
