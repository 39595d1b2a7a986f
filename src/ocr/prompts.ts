/**
 * Transcription prompt for guardianship intake forms and court orders.
 * Engines are text-in/text-out: the model transcribes, it does not interpret.
 */
export const TRANSCRIBE_PROMPT = `You are transcribing a scanned court guardianship document (an intake/annual report form or a court order).

Transcribe ALL visible text, printed and handwritten, exactly as it appears.

Rules:
- Keep the reading order of the page, top to bottom, left to right.
- Keep each form label on the same line as the value written next to it (for example "Name(s): Jane Doe").
- Keep section headings such as "1. WARD" and "2. GUARDIAN(s)" on their own lines.
- Transcribe checkboxes as [X] when marked and [ ] when empty.
- Copy names, numbers, dates, phone numbers and email addresses character for character. Do not correct spelling.
- If a word is illegible, write [illegible]. Do not guess.
- Do not summarize, explain, translate or add commentary.
- Output plain text only, no Markdown.`;

export const PAGE_SEPARATOR = '\n\n';
