export const SYSTEM_PROMPT = `You are BiomeAI, an expert microbiome analyst assistant. You help people understand the gut microbiome test report they uploaded.

Response guidelines:
- Ground every statement in the report sections you are given; never invent values
- Reference specific data from their report (organisms, scores, ranges)
- Be direct, specific and supportive
- Use short bullet points for key findings
- You are not a doctor: suggest consulting a healthcare provider for medical decisions`;

export type PromptKind = "diet" | "energy" | "digestive" | "summary" | "insight" | "freeform";

export interface PromptTemplate {
  /** Retrieval query used to pick report sections for this turn. */
  query: string;
  /** Task appended after the conversation; absent for free-form answers. */
  instruction: string | null;
  /** Completion cap; undefined leaves length to the model. */
  maxTokens?: number;
  /** Hard cap on the delivered text, in characters. */
  maxChars?: number;
  temperature: number;
}

const PREDICTION_RULES = `Rules:
- 2-4 short bullet points, under 600 characters in total
- Tie each point to an organism or marker in the report sections
- Do not ask a question; the user will be asked to confirm separately`;

export const PROMPT_TEMPLATES: Record<PromptKind, PromptTemplate> = {
  diet: {
    query: "diet fiber protein sugar food microbiome bacteria",
    instruction: `Predict what this person typically eats, based only on the bacteria and markers in their report.\n\n${PREDICTION_RULES}`,
    maxTokens: 250,
    maxChars: 800,
    temperature: 0.7,
  },
  energy: {
    query: "energy metabolism fatigue short chain fatty acids butyrate bacteria",
    instruction: `Predict this person's typical energy levels through the day (mornings, after meals, afternoons), based only on their report and what they told you about their diet.\n\n${PREDICTION_RULES}`,
    maxTokens: 250,
    maxChars: 800,
    temperature: 0.7,
  },
  digestive: {
    query: "digestive symptoms bloating gas inflammation bacteria",
    instruction: `Predict which digestive symptoms this person might experience, based only on their report and what they told you so far.\n\n${PREDICTION_RULES}`,
    maxTokens: 250,
    maxChars: 800,
    temperature: 0.7,
  },
  summary: {
    query: "key findings diversity score beneficial bacteria imbalances",
    instruction: `Write an executive summary of this microbiome report, personalised with everything the user told you about antibiotics, diet, energy and digestion.

Cover:
1. Key findings from the report
2. Notable patterns or concerns
3. Personalized recommendations based on their lifestyle
4. One specific actionable next step

Keep it engaging and supportive, focused on practical insights.`,
    temperature: 0.7,
  },
  insight: {
    query: "recommendations foods supplements improve gut health",
    instruction: `Give the single most useful change this person could make this week, based on their report and the summary you just gave. Two or three sentences: what to do, and which finding it addresses. No preamble.`,
    maxTokens: 200,
    maxChars: 600,
    temperature: 0.7,
  },
  freeform: {
    query: "",
    instruction: null,
    temperature: 0.7,
  },
};

export const UPLOAD_MARKER = (filename: string) => `[PDF Upload: ${filename}]`;

export const REPLIES = {
  progress: "📊 Analyzing your microbiome report...",
  busy: "⏳ I'm still processing your previous upload. Please wait a moment!",
  notPdf: "📄 I can only read PDF reports. Please upload a .pdf file.",
  alreadyHasReport: "🧬 This thread already has a report. Start a new thread to upload another one.",
  uploadInvite: "Greetings! 🧬 Upload a microbiome report and we can get started!",
  uploadRequired: "📎 I don't have a report for this thread yet. Upload a PDF report to get started.",
  questionsWelcome: "🎯 **Ready for your questions!** Ask me anything about your microbiome results.",
  generic: "❌ Sorry, I encountered an error. Please try again.",
};

export function greetingWithDate(longDate: string, ageMonths: number): string {
  const age = ageMonths === 1 ? "1 month" : `${ageMonths} months`;
  return (
    `📅 I see your microbiome report was generated on **${longDate}**\n` +
    `That's roughly **${age}** ago. Gut profiles can shift fast, so I'll keep that in mind.\n\n` +
    "Did you take any antibiotics around the time of the test?"
  );
}

export const GREETING_WITHOUT_DATE =
  "📅 Looks like the report date is missing.\nWhen did you take this test? (Month & year is enough.) " +
  "And did you take any antibiotics around that time?";

/** Wrap a model completion in the framing shown to the user for each turn kind. */
export function frameReply(kind: PromptKind, content: string): string {
  switch (kind) {
    case "diet":
      return `🍽️ **Based on your gut bacteria, I predict you typically eat:**\n\n${content}\n\n**Is this accurate?** Tell me about your actual diet and any restrictions you have.`;
    case "energy":
      return `⚡ **Based on your microbiome, I predict your energy looks like this:**\n\n${content}\n\n**How close is that?** Tell me how your energy actually feels through the day.`;
    case "digestive":
      return `🤢 **Based on your microbiome, I predict you might experience:**\n\n${content}\n\n**What digestive symptoms do you actually experience?** (or none if you feel great!)`;
    case "summary":
      return `🧬 **EXECUTIVE SUMMARY**\n\n${content}`;
    case "insight":
      return `💡 **One thing to try first:**\n\n${content}`;
    case "freeform":
      return content;
  }
}
