import { z } from "zod";

const countSchema = z.union([z.string(), z.number()]).optional();

export const apiErrorSchema = z.object({
	error: z.object({
		code: z.number().optional(),
		message: z.string().optional(),
		errors: z
			.array(
				z.object({
					reason: z.string().optional(),
					message: z.string().optional(),
				}),
			)
			.optional(),
	}),
});

export type ApiErrorBody = z.infer<typeof apiErrorSchema>;

export const searchListSchema = z.object({
	nextPageToken: z.string().optional(),
	items: z
		.array(
			z.object({
				id: z.object({
					kind: z.string().optional(),
					videoId: z.string().optional(),
					channelId: z.string().optional(),
				}),
				snippet: z
					.object({
						title: z.string().optional(),
						channelId: z.string().optional(),
						channelTitle: z.string().optional(),
					})
					.optional(),
			}),
		)
		.default([]),
});

export const playlistItemsSchema = z.object({
	nextPageToken: z.string().optional(),
	items: z
		.array(
			z.object({
				contentDetails: z
					.object({ videoId: z.string().optional() })
					.optional(),
				snippet: z
					.object({
						resourceId: z
							.object({ videoId: z.string().optional() })
							.optional(),
					})
					.optional(),
			}),
		)
		.default([]),
});

const thumbnailSchema = z.object({ url: z.string().optional() });

export const videosListSchema = z.object({
	items: z
		.array(
			z.object({
				id: z.string(),
				snippet: z
					.object({
						title: z.string().optional(),
						publishedAt: z.string().optional(),
						thumbnails: z.record(z.string(), thumbnailSchema).optional(),
					})
					.optional(),
				statistics: z
					.object({
						viewCount: countSchema,
						likeCount: countSchema,
						commentCount: countSchema,
					})
					.optional(),
				contentDetails: z
					.object({ duration: z.string().optional() })
					.optional(),
			}),
		)
		.default([]),
});

export type VideoResource = z.infer<typeof videosListSchema>["items"][number];

export const channelsListSchema = z.object({
	items: z
		.array(
			z.object({
				id: z.string(),
				snippet: z.object({ title: z.string().optional() }).optional(),
				contentDetails: z
					.object({
						relatedPlaylists: z
							.object({ uploads: z.string().optional() })
							.optional(),
					})
					.optional(),
				statistics: z
					.object({ videoCount: countSchema })
					.optional(),
			}),
		)
		.default([]),
});

export type ChannelResource = z.infer<typeof channelsListSchema>["items"][number];

export const playlistsListSchema = z.object({
	items: z
		.array(
			z.object({
				id: z.string(),
				snippet: z.object({ title: z.string().optional() }).optional(),
				contentDetails: z.object({ itemCount: countSchema }).optional(),
			}),
		)
		.default([]),
});

export type PlaylistResource = z.infer<typeof playlistsListSchema>["items"][number];
