import { z } from 'zod';

const FieldRuleSchema = z.object({
    key: z.string().min(1),
    label: z.string().min(1),
    multiline: z.boolean().optional(),
    defaultValue: z.string()
});

export const SiteProfileSchema = z.object({
    name: z.string().min(1),
    loginUrl: z.string().url('loginUrl must be a valid URL'),
    searchUrl: z.string().url('searchUrl must be a valid URL'),
    selectors: z.object({
        username: z.string().min(1),
        password: z.string().min(1),
        loginForm: z.string().min(1),
        firstName: z.string().min(1),
        lastName: z.string().min(1),
        startDate: z.string().min(1).optional(),
        searchButton: z.string().min(1),
        results: z.string().min(1),
        entry: z.string().min(1),
        noResults: z.string().min(1).optional()
    }),
    noResultsText: z.array(z.string().min(1)).default([]),
    lookbackDays: z.number().int().min(1).default(730),
    fields: z.array(FieldRuleSchema).min(1, 'At least one field rule is required'),
    derived: z.object({
        bookingDate: z.string().min(1),
        releaseDate: z.string().min(1),
        location: z.string().min(1)
    }).optional(),
    custodyIndicators: z.array(z.string().min(1)).default([]),
    columns: z.array(z.string().min(1)).default([])
});

export type FieldRule = z.infer<typeof FieldRuleSchema>;
export type SiteProfile = z.infer<typeof SiteProfileSchema>;
