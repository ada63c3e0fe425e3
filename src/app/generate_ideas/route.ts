import { NextRequest, NextResponse } from "next/server";
import { createTextGenerator } from "@/lib/ai/router";
import { generateIdeas } from "@/lib/blog/generator";
import { getConfig } from "@/lib/config";
import { parseJsonBody, toErrorResponse } from "@/lib/http/responses";
import { generateIdeasSchema } from "@/lib/http/schemas";

// POST /generate_ideas - Brainstorm blog ideas for a genre
export async function POST(request: NextRequest) {
  const parsed = await parseJsonBody(request, generateIdeasSchema);
  if (!parsed.ok) return parsed.response;

  try {
    const generate = createTextGenerator(getConfig().ai);
    const ideas = await generateIdeas(generate, parsed.data.genre);
    return NextResponse.json({ ideas });
  } catch (error) {
    return toErrorResponse(error, "generation_failed");
  }
}
