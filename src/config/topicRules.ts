export type TopicRules = {
  keywords: readonly string[]
  patterns: readonly RegExp[]
  rejection: string
}

export const defaultTopicRules: TopicRules = {
  keywords: [
    "culture", "cultural", "art", "arts", "music", "literature", "tradition",
    "heritage", "festival", "custom", "society", "language", "dance",
    "ritual", "belief", "museum", "history", "film", "painting",
    "architecture", "sculpture", "folklore", "mythology", "religion",
    "philosophy", "anthropology", "archaeology", "ethnic", "national identity",
  ],
  patterns: [
    /(cultural|artistic|historical|traditional).*(practice|aspect|significance|context)/,
    /(work|piece) of (art|literature|music)/,
    /(historical|cultural) (event|period|figure|monument)/,
    /(traditional|folk) (dance|music|costume|craft)/,
    /^(how|what|when|where|why).*(culture|art|history|tradition)/,
  ],
  rejection:
    "This assistant only answers culture-related questions. " +
    "Please rephrase your question to focus on arts, traditions, heritage, " +
    "history, or any other cultural topics.",
}
