import notifier from "node-notifier";
import { loadConfig } from "../config/loader";
import type { ErrorTemplate } from "../utils/error-templates";
import { logger } from "../utils/logger";

export type NotificationType = "info" | "success" | "warning" | "error";

const ICONS: Record<NotificationType, string> = {
	info: "dialog-information",
	success: "emblem-default",
	warning: "dialog-warning",
	error: "dialog-error",
};

export const notify = (
	title: string,
	message: string,
	type: NotificationType = "info",
) => {
	try {
		const config = loadConfig();
		if (!config.behavior.notifications) {
			return;
		}

		notifier.notify({
			title: `voxlane: ${title}`,
			message,
			icon: ICONS[type],
			sound: type === "error",
			wait: false,
		});

		logger.info({ title, message, type }, "Notification sent");
	} catch (error) {
		logger.error({ err: error }, "Failed to send notification");
	}
};

/** Desktop notification for a user-facing error template. */
export const notifyError = (title: string, template: ErrorTemplate) =>
	notify(title, `${template.message} ${template.action}`, "error");
