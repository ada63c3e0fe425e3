import { NextRequest, NextResponse } from "next/server";
import { getConfig, requireWordPress } from "@/lib/config";
import { parseJsonBody, toErrorResponse } from "@/lib/http/responses";
import { publishSchema } from "@/lib/http/schemas";
import { publishDetail, publishPost } from "@/lib/publish/publisher";

// POST /publish - Create the WordPress post and attach the featured image
export async function POST(request: NextRequest) {
  const parsed = await parseJsonBody(request, publishSchema);
  if (!parsed.ok) return parsed.response;
  const body = parsed.data;

  try {
    const config = getConfig();
    const result = await publishPost(
      {
        title: body.title,
        content: body.content,
        status: body.status,
        featuredImageUrl: body.featured_image_url,
        photographerName: body.photographer_name,
        photographerLink: body.photographer_link,
      },
      {
        wordpress: requireWordPress(config),
        http: config.http,
        imageOptimize: config.imageOptimize,
      }
    );

    return NextResponse.json({
      detail: publishDetail(body.status),
      postId: result.postId,
      featuredImageUrl: result.featuredImageUrl,
      featuredImage: result.featuredImage,
    });
  } catch (error) {
    return toErrorResponse(error, "publish_failed");
  }
}
