import { NextRequest, NextResponse } from "next/server";
import { getConfig, requireUnsplash } from "@/lib/config";
import { toErrorResponse, validate } from "@/lib/http/responses";
import { randomImageQuerySchema } from "@/lib/http/schemas";
import { fetchRandomPhoto } from "@/lib/unsplash/client";

export const dynamic = "force-dynamic";

// GET /get_random_image?genre=... - Random landscape photo for preview
export async function GET(request: NextRequest) {
  const parsed = validate(randomImageQuerySchema, {
    genre: request.nextUrl.searchParams.get("genre") ?? undefined,
  });
  if (!parsed.ok) return parsed.response;

  try {
    const config = getConfig();
    const photo = await fetchRandomPhoto(parsed.data.genre, requireUnsplash(config), config.http);
    return NextResponse.json({
      image_url: photo.imageUrl,
      photographer_name: photo.photographerName,
      photographer_link: photo.photographerLink,
    });
  } catch (error) {
    return toErrorResponse(error, "photo_lookup_failed");
  }
}
