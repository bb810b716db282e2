/**
 * Prompt templates for the hosted language model.
 * Placeholders are {name}; render() substitutes them verbatim.
 */

export const INSIGHT_PROMPT = `You are a marketing AI assistant analyzing customer feedback to extract business insights.
Analyze the following customer text for marketing intelligence and unmet needs.

Customer Text: """{text}"""
Source: {source}
Category: {category}

Analyze for:
1. Sentiment (-1 to 1 scale) and a sentiment label
2. Unmet customer needs
3. Pain points and frustrations
4. Positive aspects mentioned
5. Marketing recommendations
6. Your confidence in this analysis (0 to 1)

Use an empty list when a category has nothing to report.
Respond ONLY with valid JSON in this exact format:
{
  "sentiment_score": 0.0,
  "sentiment_label": "positive|negative|neutral|mixed",
  "unmet_needs": ["need1", "need2"],
  "pain_points": ["pain1", "pain2"],
  "positive_aspects": ["positive1", "positive2"],
  "recommendations": ["rec1", "rec2"],
  "confidence": 0.85
}`;

export const TRANSLATION_PROMPT = `Translate the following {language} customer feedback into English.
Keep product names, numbers and the customer's tone. Do not summarize.

Customer Text: """{text}"""

Respond ONLY with valid JSON:
{
  "english_translation": "translated text"
}`;

export function render(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : placeholder
  );
}
