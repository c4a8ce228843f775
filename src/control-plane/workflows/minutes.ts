import type { UpstreamEvent } from "../../contracts/upstream_event";
import type { WorkflowContext } from "./types";

export const MINUTES_TASK = "mattermost_minutes_sent";

/** A single "Kim, Lee, Park" entry is one comma-separated list. */
export function splitParticipants(names: string[] | undefined): string[] {
  if (!names || names.length === 0) return [];
  const raw = names.length === 1 ? (names[0] ?? "").split(",") : names;
  return raw.map((name) => name.trim()).filter(Boolean);
}

// Progress is streamed as content, so each line carries its own break.
const progress = (text: string): UpstreamEvent => ({ type: "text", text: `${text}\n` });

export function minutesMessage(title: string, minutesUrl: string): string {
  return `[${title}] Meeting minutes are ready. Open them here:\n\n${minutesUrl}`;
}

/** Send the current meeting's minutes link to every participant as a Mattermost DM. */
export async function* minutesWorkflow(ctx: WorkflowContext): AsyncGenerator<UpstreamEvent> {
  const { log, sessionId } = ctx;
  const meeting = ctx.meetingContext;

  yield progress("Preparing to send the meeting minutes...");

  if (!meeting) {
    yield progress("No meeting context was provided. Sending minutes requires the meeting details.");
    yield {
      type: "error",
      message: "Meeting context is missing.",
      details: "A meeting context is required.",
    };
    return;
  }

  if (!meeting.minutesUrl) {
    yield progress("No minutes URL was provided. Sending minutes requires a link to the minutes.");
    yield {
      type: "error",
      message: "Minutes URL is missing.",
      details: "A minutes URL is required.",
    };
    return;
  }

  const title = meeting.title ?? "Meeting";
  const participants = splitParticipants(meeting.participantNames);
  log.info({ sessionId, participantCount: participants.length }, "minutes.participants_resolved");

  if (participants.length === 0) {
    yield progress("No meeting participants were provided. Sending minutes requires at least one participant.");
    yield { type: "warning", message: "No meeting participants; nothing was sent." };
    return;
  }

  const mattermost = ctx.services.mattermost;
  if (!mattermost) {
    yield {
      type: "error",
      message: "Mattermost is not configured.",
      details: "Set MATTERMOST_URL and MATTERMOST_BOT_TOKEN.",
    };
    return;
  }

  yield progress(`Participants of '${title}': ${participants.join(", ")}`);
  yield progress(`Sending the minutes of '${title}' to ${participants.length} participants...`);

  const message = minutesMessage(title, meeting.minutesUrl);
  const userMap = ctx.services.settings.mattermostUserMap;
  const failed: string[] = [];
  let successCount = 0;

  for (const name of participants) {
    yield progress(`Sending minutes to '${name}'...`);
    try {
      await mattermost.sendDirectMessage(userMap[name] ?? name, message);
      successCount += 1;
      yield progress(`Minutes sent to '${name}'.`);
    } catch (err) {
      log.warn({ sessionId, err }, "minutes.delivery_failed");
      failed.push(name);
      yield progress(`Could not send minutes to '${name}'.`);
    }
  }

  if (successCount > 0) {
    yield progress(`The minutes of '${title}' were sent to ${successCount} participants.`);
    yield {
      type: "task_complete",
      task: MINUTES_TASK,
      details: { success_count: successCount, total_count: participants.length },
    };
  }

  if (failed.length > 0) {
    yield progress(`Could not deliver to: ${failed.join(", ")}`);
  }

  if (successCount > 0 && failed.length > 0) {
    yield {
      type: "result",
      success: true,
      partial: true,
      message: `The minutes of '${title}' were sent to ${successCount} participants through Mattermost. ${failed.length} deliveries failed.`,
    };
  } else if (successCount > 0) {
    yield {
      type: "result",
      success: true,
      partial: false,
      message: `The minutes of '${title}' were sent to all participants through Mattermost.`,
    };
  } else {
    yield {
      type: "result",
      success: false,
      message: "Sending the minutes failed. Check that the participants are registered in Mattermost.",
    };
  }
}
