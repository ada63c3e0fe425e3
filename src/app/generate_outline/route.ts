import { NextRequest, NextResponse } from "next/server";
import { createTextGenerator } from "@/lib/ai/router";
import { generateOutline } from "@/lib/blog/generator";
import { getConfig } from "@/lib/config";
import { parseJsonBody, toErrorResponse } from "@/lib/http/responses";
import { generateOutlineSchema } from "@/lib/http/schemas";

// POST /generate_outline - Outline for the selected idea
export async function POST(request: NextRequest) {
  const parsed = await parseJsonBody(request, generateOutlineSchema);
  if (!parsed.ok) return parsed.response;

  try {
    const generate = createTextGenerator(getConfig().ai);
    const outline = await generateOutline(generate, parsed.data.idea, parsed.data.length_type);
    return NextResponse.json({ outline });
  } catch (error) {
    return toErrorResponse(error, "generation_failed");
  }
}
