import { z } from "zod";

/**
 * One message as delivered by a listener. Fields the sender did not
 * supply are absent; listeners outside this package may report them as
 * null instead.
 */
export interface SyslogEvent {
	readonly date?: Date | null;
	readonly facility?: number | null;
	readonly host?: string | null;
	readonly level?: number | null;
	readonly message?: string | null;
	readonly charset?: string | null;
}

/** A well-formed event must carry a message; everything else is optional. */
export const syslogEventSchema = z.object({
	date: z.date().nullish(),
	facility: z.number().int().min(0).max(23).nullish(),
	host: z.string().nullish(),
	level: z.number().int().min(0).max(7).nullish(),
	message: z.string(),
	charset: z.string().nullish(),
});

export type ValidSyslogEvent = z.infer<typeof syslogEventSchema>;
