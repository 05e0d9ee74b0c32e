export type User = {
	readonly id: string;
	readonly name: string;
	readonly url: string;
};

export type ImageAttachment = {
	readonly type: "image";
	readonly url: string;
	readonly alt: string;
};

export type LinkAttachment = {
	readonly type: "link";
	readonly url: string;
	readonly text: string;
};

export type Attachment = ImageAttachment | LinkAttachment;

export type Comment = {
	readonly text: string;
	/** Epoch seconds, 0 when no timestamp could be resolved */
	readonly createdAt: number;
	readonly author: User;
	readonly reactionCount: number;
	readonly commentCount: number;
};

export type Post = {
	/** Epoch seconds, 0 when no timestamp could be resolved */
	readonly createdAt: number;
	readonly url: string;
	readonly user: User;
	readonly text: string;
	readonly attachments: readonly Attachment[];
	readonly reactionCount: number;
	readonly shareCount: number;
	readonly commentCount: number;
	readonly topComments: readonly Comment[];
};

export type Diagnostic = {
	level: "debug";
	message: string;
	field?: string;
	container?: number;
	error?: unknown;
};

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export const EMPTY_USER: User = { id: "", name: "", url: "" };
