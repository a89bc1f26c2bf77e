import type { ProductRecord } from "./catalog";

export interface PromptContext {
  systemInstruction: string;
  userPrompt: string;
}

export const SYSTEM_INSTRUCTION = "Eres un asistente dental especializado y respondes siempre en español.";

const GROUNDING_PREAMBLE =
  "Eres un asistente dental especializado que ayuda a responder preguntas sobre productos dentales. " +
  "Usa únicamente la siguiente información para tu respuesta en español.";

const SECTIONS = [
  ["Descripción del Producto", "Description"],
  ["Instrucciones de Uso", "UsageInstructions"],
  ["Ventajas", "Advantages"],
  ["Presentación", "Presentation"],
] as const;

export function buildPrompt(record: ProductRecord, question: string): PromptContext {
  const sections = SECTIONS.map(([label, field]) => `**${label}**: ${record[field]}`).join("\n");

  return {
    systemInstruction: SYSTEM_INSTRUCTION,
    userPrompt: `${GROUNDING_PREAMBLE}\n\n${sections}\n\n**Pregunta del Usuario**: ${question}\n**Respuesta**:`,
  };
}
