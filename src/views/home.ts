import { SetEntryInterface, SetStat, SetStatsByExercise } from "../types/SetEntryInterface";
import { UserInterface } from "../types/UserInterface";
import {
  TemplateExerciseInterface,
  WorkoutTemplateInterface,
} from "../types/WorkoutTemplateInterface";
import { escapeHtml, hiddenInput, page } from "./layout";

export interface HomeView {
  user: UserInterface;
  templates: WorkoutTemplateInterface[];
  selectedTemplate: WorkoutTemplateInterface | null;
  exercises: TemplateExerciseInterface[];
  last: SetStatsByExercise;
  pr: SetStatsByExercise;
  today: string;
  edit: boolean;
  activeSessionId: number | null;
  sessionSets: SetEntryInterface[];
}

function describe(stat: SetStat | undefined): string {
  if (!stat) return "—";
  return `${stat.weight} × ${stat.reps} <small>(${escapeHtml(stat.day)})</small>`;
}

function templateNav(view: HomeView): string {
  const links = view.templates.map((t) => {
    const active = view.selectedTemplate?.id === t.id ? ' class="active"' : "";
    return `<a href="/?t=${t.id}"${active}>${escapeHtml(t.name)}</a>`;
  });
  if (view.user.isAdmin && view.selectedTemplate) {
    const t = view.selectedTemplate.id;
    links.push(view.edit ? `<a href="/?t=${t}">Done editing</a>` : `<a href="/?t=${t}&amp;edit=1">Edit template</a>`);
  }
  return `<nav>${links.join("")}</nav>`;
}

function exerciseCard(view: HomeView, template: WorkoutTemplateInterface, ex: TemplateExerciseInterface): string {
  const removeForm = view.edit
    ? `<form class="inline" method="post" action="/template/remove_exercise">${hiddenInput("template_id", template.id)}${hiddenInput("exercise_id", ex.id)}<button type="submit">Remove</button></form>`
    : "";
  return `<div class="card">
  <h2>${escapeHtml(ex.name)} ${removeForm}</h2>
  <div class="stats">Last: ${describe(view.last[ex.name])} · PR: ${describe(view.pr[ex.name])}</div>
  <form method="post" action="/log">
    ${hiddenInput("template_id", template.id)}${hiddenInput("workout", template.name)}${hiddenInput("exercise", ex.name)}
    <input type="number" name="weight" min="0" max="2000" step="any" placeholder="kg" required>
    <input type="number" name="reps" min="1" max="200" step="1" placeholder="reps" required>
    <button type="submit">Log set</button>
  </form>
</div>`;
}

function addExerciseForm(template: WorkoutTemplateInterface): string {
  return `<form method="post" action="/template/add_exercise">
  ${hiddenInput("template_id", template.id)}
  <input type="text" name="exercise_name" placeholder="Exercise name" required>
  <button type="submit">Add exercise</button>
</form>`;
}

function sessionPanel(view: HomeView, template: WorkoutTemplateInterface): string {
  if (view.activeSessionId === null) {
    return `<p class="stats">No open session today. Logging a set starts one.</p>`;
  }
  const rows = view.sessionSets
    .map(
      (s) =>
        `<tr><td>${escapeHtml(s.createdAt.slice(11, 16))}</td><td>${escapeHtml(s.exercise)}</td><td>${s.weight}</td><td>${s.reps}</td></tr>`,
    )
    .join("");
  return `<h2>Session #${view.activeSessionId} (${escapeHtml(view.today)})</h2>
<table><thead><tr><th>Time</th><th>Exercise</th><th>kg</th><th>Reps</th></tr></thead><tbody>${rows}</tbody></table>
<form method="post" action="/session/done">${hiddenInput("template_id", template.id)}<button type="submit">Finish workout</button></form>`;
}

export function renderHome(view: HomeView): string {
  const header = `<p class="stats">${escapeHtml(view.user.email)}${view.user.isAdmin ? " (admin)" : ""}
  <form class="inline" method="post" action="/logout"><button type="submit">Log out</button></form></p>`;

  const template = view.selectedTemplate;
  if (!template) {
    return page("Gymlog", `${header}<h1>Gymlog</h1>${templateNav(view)}<p>No workout template selected.</p>`);
  }

  const cards = view.exercises.map((ex) => exerciseCard(view, template, ex)).join("");
  const body = `${header}<h1>${escapeHtml(template.name)}</h1>${templateNav(view)}
${sessionPanel(view, template)}
${cards || "<p>This template has no exercises yet.</p>"}
${view.edit ? addExerciseForm(template) : ""}`;
  return page(`Gymlog · ${template.name}`, body);
}
