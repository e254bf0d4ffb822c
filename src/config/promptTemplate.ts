import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs"
import path from "path"
import { UnknownSectionError } from "../errors"

export const SECTION_KEYS = ["role", "task", "constraints", "style", "output_format"] as const
export type SectionKey = (typeof SECTION_KEYS)[number]
export type Sections = Record<SectionKey, string>

export const DEFAULT_LOCALE = "en-US"

export const defaultSections: Readonly<Sections> = {
  role: "You are a friendly, precise cultural assistant for quick, factual guidance",
  task: "Answer cultural questions clearly and briefly. Prioritize accuracy, define terms, and add one actionable tip when helpful",
  constraints: "Do not fabricate references. If unsure, say so briefly. Avoid policy, medical, or legal advice. Keep answers under 200 words when possible",
  style: "Tone: warm, concise, non-patronizing. Use simple sentences and neutral vocabulary.",
  output_format: "Answer using this structure:\n1) Direct answer (2-4 sentences)\n2) Optional bullets (max 3)\n3) One follow-up question on user intent",
}

export const isSectionKey = (k: string): k is SectionKey => (SECTION_KEYS as readonly string[]).includes(k)

export class PromptTemplate {
  private constructor(private readonly dir: string, private readonly current: Sections) {}

  /** Built-in defaults, each replaced by `<dir>/<key>.txt` when that file exists. */
  static load(dir: string) {
    const sections: Sections = { ...defaultSections }
    for (const key of SECTION_KEYS) {
      const file = path.join(dir, `${key}.txt`)
      if (existsSync(file)) sections[key] = readFileSync(file, "utf-8").trim()
    }
    return new PromptTemplate(dir, sections)
  }

  sections(): Readonly<Sections> {
    return { ...this.current }
  }

  buildSystem(memory: readonly string[] = [], locale: string = DEFAULT_LOCALE) {
    const s = this.current
    const blocks = [
      s.role,
      `Task:\n${s.task}`,
      `Constraints:\n${s.constraints}`,
      `Style:\n${s.style}`,
      `Output format:\n${s.output_format}`,
    ]
    if (memory.length) blocks.push(`Conversation memory:\n${memory.map((m) => `- ${m}`).join("\n")}`)
    if (locale !== DEFAULT_LOCALE) blocks.push(`Note: Respond in a culturally appropriate way for ${locale}.`)
    return blocks.join("\n\n")
  }

  updateSection(key: string, content: string) {
    if (!isSectionKey(key)) throw new UnknownSectionError(key)
    mkdirSync(this.dir, { recursive: true })
    writeFileSync(path.join(this.dir, `${key}.txt`), content, "utf-8")
    this.current[key] = content
  }
}
