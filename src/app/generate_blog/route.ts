import { NextRequest, NextResponse } from "next/server";
import { createTextGenerator } from "@/lib/ai/router";
import { writeBlogPost } from "@/lib/blog/generator";
import { getConfig } from "@/lib/config";
import { parseJsonBody, toErrorResponse } from "@/lib/http/responses";
import { generateBlogSchema } from "@/lib/http/schemas";

// POST /generate_blog - Full article from outline, style and length
export async function POST(request: NextRequest) {
  const parsed = await parseJsonBody(request, generateBlogSchema);
  if (!parsed.ok) return parsed.response;

  try {
    const generate = createTextGenerator(getConfig().ai);
    const blogPost = await writeBlogPost(generate, {
      outline: parsed.data.outline,
      writingStyle: parsed.data.writing_style,
      lengthType: parsed.data.length_type,
    });
    return NextResponse.json({ blog_post: blogPost });
  } catch (error) {
    return toErrorResponse(error, "generation_failed");
  }
}
