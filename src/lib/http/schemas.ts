import { z } from "zod";
import { DEFAULT_WRITING_STYLE, lengthTypeSchema } from "@/lib/blog/types";

const text = (field: string) => z.string().trim().min(1, `${field} is required`);

// Empty form fields mean "not provided"
const blankAsNull = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? null : value), schema);

export const generateIdeasSchema = z.object({
  genre: text("genre"),
});

export const selectIdeaSchema = z.object({
  ideas: z.array(text("idea")).min(1, "at least one idea is required"),
});

export const generateOutlineSchema = z.object({
  idea: text("idea"),
  length_type: lengthTypeSchema,
});

export const generateBlogSchema = z.object({
  outline: text("outline"),
  writing_style: z.string().trim().nullish().transform((v) => v || DEFAULT_WRITING_STYLE),
  length_type: lengthTypeSchema,
});

export const randomImageQuerySchema = z.object({
  genre: text("genre"),
});

export const publishSchema = z.object({
  title: text("title"),
  content: z.string(),
  status: text("status"),
  featured_image_url: blankAsNull(
    z.string().url("featured_image_url must be a valid URL").nullish()
  ),
  photographer_name: blankAsNull(z.string().nullish()),
  photographer_link: blankAsNull(z.string().nullish()),
});
