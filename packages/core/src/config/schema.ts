import { z } from "zod";

export const targetFormatSchema = z.enum(["html", "latex", "pdf"]);

export const accessSchema = z.enum(["private", "public"]);

export const settingsSchema = z.object({
  port: z.number().int().min(0).max(65535),
  access: accessSchema,
  stylesheets: z.string().min(1, "stylesheets directory required"),
  executables: z.object({
    xsltproc: z.string().min(1),
    pdflatex: z.string().min(1),
  }),
});

export type SettingsInput = z.infer<typeof settingsSchema>;
