/**
 * Prompt templates. Placeholders are `{name}`; every one must be supplied
 * when rendering.
 */

export const SUMMARIZE_TEMPLATE = `Summarize the following text in at most {maxSentences} sentences.
Keep the key facts and drop repetition.

Text:
{text}

Summary:`;

export const TRANSLATE_TEMPLATE = `Translate the following text into {language}.
Return only the translation, without notes or explanations.

Text:
{text}`;

export const EXTRACT_FIELDS_TEMPLATE = `From the user input below, extract values for these fields: {fields}.
Return ONLY a JSON object whose keys are exactly: {fields}.
Use null for any field the input does not mention.

User input:
"{input}"`;

export const HTML_TAILWIND_TEMPLATE = `Generate HTML styled with Tailwind CSS for: {description}
Return ONLY the HTML markup, without comments or explanations.
Use Tailwind utility classes for all styling.`;

export const SALES_ANALYSIS_TEMPLATE = `Analyze the following sales data and report insights.

{data}

Look for:
- Sales trends over time
- Top-selling products
- Concrete suggestions for improvement`;

export const TRAFFIC_ANALYSIS_TEMPLATE = `Analyze the following website traffic data.

{data}

Look for:
- Traffic peaks
- Most visited pages
- Performance problems`;
