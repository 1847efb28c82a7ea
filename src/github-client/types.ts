import { z } from "zod";

// "owner/name"
export type RepoId = string;

export type EventKind = "stargazers" | "forks";

export interface ActorProfile {
  login: string;
  name: string | null;
  company: string | null;
  location: string | null;
  email: string | null;
  bio: string | null;
  followers: number | null;
  publicRepos: number | null;
}

/**
 * Who performed an event. Some payloads already carry the full profile, in
 * which case no lookup is needed.
 */
export type ActorRef =
  | { kind: "login"; login: string }
  | { kind: "profile"; login: string; profile: ActorProfile };

export interface ActorEvent {
  actor: ActorRef;
  // ISO-8601 instant as reported by the API
  timestamp: string;
  repo: RepoId;
}

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const optionalCount = z
  .number()
  .int()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? null);

// GET /users/{username}
export const userProfileSchema = z.object({
  login: z.string(),
  name: optionalString,
  company: optionalString,
  location: optionalString,
  email: optionalString,
  bio: optionalString,
  followers: optionalCount,
  public_repos: optionalCount,
});

export type UserProfilePayload = z.infer<typeof userProfileSchema>;

/**
 * An actor object counts as a complete profile when every attribute key is
 * present; null values are fine, missing keys are not.
 */
export const embeddedProfileSchema = z.object({
  login: z.string(),
  name: z.string().nullable(),
  company: z.string().nullable(),
  location: z.string().nullable(),
  email: z.string().nullable(),
  bio: z.string().nullable(),
  followers: z.number().int().nonnegative().nullable(),
  public_repos: z.number().int().nonnegative().nullable(),
});

const actorSchema = z.object({ login: z.string() }).passthrough();

const timestampSchema = z.string().datetime({ offset: true });

// GET /repos/{owner}/{repo}/stargazers with the star+json media type
export const stargazerSchema = z.object({
  starred_at: timestampSchema,
  user: actorSchema.nullable(),
});

// GET /repos/{owner}/{repo}/forks
export const forkSchema = z.object({
  created_at: timestampSchema,
  owner: actorSchema,
});

// GET /users/{username}/repos
export const ownerRepoSchema = z.object({
  full_name: z.string(),
});

export function toActorProfile(payload: UserProfilePayload): ActorProfile {
  return {
    login: payload.login,
    name: payload.name,
    company: payload.company,
    location: payload.location,
    email: payload.email,
    bio: payload.bio,
    followers: payload.followers,
    publicRepos: payload.public_repos,
  };
}

export function toActorRef(actor: z.infer<typeof actorSchema>): ActorRef {
  const embedded = embeddedProfileSchema.safeParse(actor);
  if (embedded.success) {
    return {
      kind: "profile",
      login: actor.login,
      profile: toActorProfile(embedded.data),
    };
  }
  return { kind: "login", login: actor.login };
}
