import { defaultTopicRules, type TopicRules } from "../config/topicRules"

export type TopicVerdict = { accepted: true } | { accepted: false; message: string }

/** Lexical accept/reject filter. Stateless; the rule table is fixed at construction. */
export class TopicGate {
  constructor(private readonly rules: TopicRules = defaultTopicRules) {}

  classify(text: string): TopicVerdict {
    const lower = text.toLowerCase()
    if (this.rules.keywords.some((k) => lower.includes(k))) return { accepted: true }
    if (this.rules.patterns.some((p) => lower.search(p) !== -1)) return { accepted: true }
    return { accepted: false, message: this.rules.rejection }
  }
}
