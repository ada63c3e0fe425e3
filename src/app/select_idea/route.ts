import { NextRequest, NextResponse } from "next/server";
import { createTextGenerator } from "@/lib/ai/router";
import { selectIdea } from "@/lib/blog/generator";
import { getConfig } from "@/lib/config";
import { parseJsonBody, toErrorResponse } from "@/lib/http/responses";
import { selectIdeaSchema } from "@/lib/http/schemas";

// POST /select_idea - Let the reviewer model pick the best idea
export async function POST(request: NextRequest) {
  const parsed = await parseJsonBody(request, selectIdeaSchema);
  if (!parsed.ok) return parsed.response;

  try {
    const generate = createTextGenerator(getConfig().ai);
    const selected = await selectIdea(generate, parsed.data.ideas);
    return NextResponse.json({ selected_idea: selected });
  } catch (error) {
    return toErrorResponse(error, "generation_failed");
  }
}
