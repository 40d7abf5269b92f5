import type { Request, Response, NextFunction } from "express";
import { z } from "zod";

const LangTag = z.string().min(1).optional();

const UtteranceRequestSchema = z.object({
  utterances: z.array(z.string().min(1)).min(1),
  lang: LangTag,
  context: z
    .object({
      stt_lang: LangTag,
      request_lang: LangTag,
      session_id: z.string().optional(),
      skill_id: z.string().optional(),
    })
    .passthrough()
    .default({}),
});

export type UtteranceRequest = z.infer<typeof UtteranceRequestSchema>;

export function validateEvent() {
  return (req: Request, res: Response, next: NextFunction) => {
    const parse = UtteranceRequestSchema.safeParse(req.body || {});
    if (!parse.success) {
      return res.status(400).json({ error: "invalid_event", issues: parse.error.issues });
    }
    res.locals.event = parse.data;
    next();
  };
}

export function eventOf(res: Response): UtteranceRequest {
  return UtteranceRequestSchema.parse(res.locals.event);
}
