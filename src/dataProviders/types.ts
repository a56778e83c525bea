import { z } from 'zod';

export const installSides = ['server', 'client', 'both'] as const;
export type InstallSide = typeof installSides[number];

export const modTypes = ['mod', 'externaltool', 'other'] as const;
export type ModType = typeof modTypes[number];

/*
Example record from /api/mods:
  {
    "modid": 2158,
    "assetid": 13481,
    "downloads": 5210,
    "follows": 77,
    "trendingpoints": 12,
    "comments": 9,
    "name": "Example Storage",
    "summary": "Adds a few more chests",
    "modidstrs": ["examplestorage"],
    "author": "someauthor",
    "urlalias": "examplestorage",
    "side": "both",
    "type": "mod",
    "logo": "https://mods.vintagestory.at/files/asset/13481/logo.png",
    "tags": ["Storage", "QoL"],
    "lastreleased": "2023-05-01 12:00:00"
  }
*/
export const modDbModSchema = z.object({
  modid: z.number().int(),
  assetid: z.number().int(),
  downloads: z.number().int(),
  follows: z.number().int(),
  trendingpoints: z.number().int(),
  comments: z.number().int(),
  name: z.string(),
  summary: z.string().nullish(),
  modidstrs: z.array(z.string()).optional(),
  author: z.string(),
  urlalias: z.string().nullish(),
  side: z.enum(installSides),
  type: z.enum(modTypes),
  logo: z.string().nullish(),
  tags: z.array(z.string()).optional(),
  lastreleased: z.string().nullish(),
});

export type ModDbMod = z.infer<typeof modDbModSchema>;

export const modDbAuthorSchema = z.object({
  userid: z.number().int(),
  name: z.string().nullable(),
});

export type ModDbAuthor = z.infer<typeof modDbAuthorSchema>;
