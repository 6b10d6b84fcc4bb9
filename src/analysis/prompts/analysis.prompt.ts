export interface PromptScope {
  category: string;
  rawQuery: string;
  part?: { index: number; total: number };
}

function partLabel(scope: PromptScope): string {
  if (!scope.part || scope.part.total <= 1) {
    return '';
  }
  return ` (part ${scope.part.index + 1}/${scope.part.total})`;
}

export function buildThemePrompt(category: string, rawQuery: string): string {
  return `You analyse information for a category manager of digital goods in the "${category}" category.
Based on the user's request below, extract the most specific topic, game, product, event or key phrase to search relevant materials with.

Request: ${rawQuery}

Return only that topic or phrase, without any extra words or explanations.`;
}

export function buildFilterPrompt(scope: PromptScope): string {
  return `You work for a category manager of digital goods in the "${scope.category}" category.
You receive materials${partLabel(scope)} as a JSON list of {"text", "url"} objects.

User request: ${scope.rawQuery}

Keep only the materials that are highly relevant to the request (a specific game, event, release, patch, metric and so on). Exclude generic information.
Reply STRICTLY with a JSON list of objects: [{"text": "...", "url": "..."}]
If no material is relevant, reply with an empty list: []`;
}

export const REPORT_STRUCTURE = `Report structure:
Trends and events (what is happening):
- Briefly what happened (date, essence)
- Source link (when present in the materials)

Impact and metrics:
- How the event affected sales, user activity, prices and metrics (GMV, ADV, CR and so on). Give concrete figures when the data has them.
- Public reaction (forums, social networks, streamers) when mentioned.

Analysis and recommendations for the category manager:
- Situation analysis (competitors, seasonality, audience, prices).
- Clear recommendations: what to do and what to watch.`;

export function buildSingleReportPrompt(scope: PromptScope): string {
  return `You are an expert in the digital goods market working for a category manager.
The user context contains filtered materials relevant to the request below, in the "${scope.category}" category.

User request: ${scope.rawQuery}

Write a detailed report for the category manager. Focus on metrics (GMV, ADV, ETR, AOV, Orders, CR, ADV/GM), reasons behind changes in demand and supply, competitor comparison when data exists, and clear recommendations.

${REPORT_STRUCTURE}

Make the report as useful as possible for business decisions.`;
}

export function buildChunkAnalysisPrompt(scope: PromptScope): string {
  return `You are an expert in the digital goods market working for a category manager.
The user context contains filtered materials${partLabel(scope)} relevant to the request below, in the "${scope.category}" category.

User request: ${scope.rawQuery}

Write an intermediate analysis of these materials only; it will be merged with the analyses of the other parts later.
Focus on metrics, reasons behind changes in demand and supply, and potential recommendations.

Intermediate analysis structure:
Trends and events:
- Briefly what happened (date, essence)
- Source link (when present)

Impact and metrics:
- Effect on sales, activity, prices and metrics, with figures when available.
- Public reaction when mentioned.

Potential recommendations:
- What to do and what to watch, based on these materials.

If these materials carry nothing for a section, say so explicitly.`;
}

export function buildSynthesisPrompt(scope: PromptScope): string {
  return `You are the lead analyst for a category manager of digital goods in the "${scope.category}" category.
The user context contains intermediate analyses of different material sets, separated by "---".
Merge them into one coherent, detailed report that answers the original request: ${scope.rawQuery}

Keep every key fact from the intermediate analyses, remove duplication, reconcile conflicting statements and synthesize the conclusions and recommendations.

Final report structure:
Overview and key trends:
- Short summary of the main events and trends.

Impact and metrics:
- Combined analysis of the impact on sales, activity, prices and metrics, citing the materials where possible.
- Overall public reaction.

Competition and market:
- Conclusions about competitors and the market.

Recommendations for the category manager:
- A clear list of final, actionable recommendations.`;
}
