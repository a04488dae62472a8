import { z } from 'zod';

/** Add-location form; the server trims and checks duplicates again. */
export const locationFormSchema = z.object({
  location_name: z.string().trim().min(1, 'Standort-Name ist erforderlich').max(255),
});

export const categoryFormSchema = z.object({
  key_name: z
    .string()
    .trim()
    .min(1, 'Schlüsselname ist erforderlich')
    .max(100)
    .regex(/^[a-z_]+$/, 'Nur Kleinbuchstaben und Unterstriche'),
  display_name: z.string().trim().min(1, 'Anzeigename ist erforderlich').max(255),
});

export type LocationFormData = z.infer<typeof locationFormSchema>;
export type CategoryFormData = z.infer<typeof categoryFormSchema>;

/** Envelope every inventory configuration endpoint answers with. */
export const apiResultSchema = z.object({
  success: z.boolean(),
  message: z.string(),
});
