export const writePaperPrompt = ({
	topic,
	research
}: {
	topic: string
	research: string
}) => `Based on the research data below, write a comprehensive academic research paper about "${topic}".

Research Data:
${research}

Structure the paper with:
1. # Title
2. ## Abstract (150-200 words)
3. ## Introduction
4. ## Literature Review/Background
5. ## Main Analysis (2-3 sections with ### subheadings)
6. ## Conclusion
7. ## References

Use formal academic language and cite the sources listed in the research data.
Format headings with markdown headers (# ## ###).
Aim for approximately 2000-2500 words.

Write the complete paper now:`

export const revisePaperPrompt = ({
	topic,
	content,
	changeRequest
}: {
	topic: string
	content: string
	changeRequest: string
}) => `You are editing a research paper about "${topic}". The user wants the following changes:

USER REQUEST: ${changeRequest}

CURRENT PAPER CONTENT:
${content}

Apply the requested changes. Keep the academic structure and the markdown headings, and return the complete modified paper.

Modified paper:`
