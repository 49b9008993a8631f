import { setTimeout as sleep } from "node:timers/promises";
import {
  type Color,
  type PresentationHost,
  ViewController,
  buttonEvent,
  color,
  createContainer,
  createScreen,
  rect,
  size,
} from "@panelkit/core";

const FRAME_MS = 16;
const WIDTH = 800;
const HEIGHT = 480;

/** Sheet that closes when the menu button is pressed. */
class SheetController extends ViewController {
  override get title(): string {
    return "Sheet";
  }

  override shouldDismissOnMenuPress(): boolean {
    return true;
  }

  override viewDidAppear(): void {
    process.stdout.write("sheet visible\n");
  }

  override viewDidDisappear(): void {
    process.stdout.write("sheet dismissed\n");
  }
}

function makeController<T extends ViewController>(
  Ctor: new (host: PresentationHost, view: number) => T,
  background: Color,
): T {
  const view = createContainer(screen.tree, rect(0, 0, WIDTH, HEIGHT), {
    backgroundColor: background,
  });
  return new Ctor(screen, view.id);
}

const screen = createScreen({ format: "argb32", size: size(WIDTH, HEIGHT) });

const home = makeController(ViewController, color(0.1, 0.1, 0.1));
const sheet = makeController(SheetController, color(0.2, 0.3, 0.6));
screen.setRootViewController(home);

let frames = 0;

async function tickUntilIdle(): Promise<void> {
  do {
    screen.processEvents();
    screen.handleAnimations();
    if (screen.isDirty()) {
      screen.redraw();
      frames++;
    }
    const y = screen.tree.getFrame(sheet.view).origin.y;
    process.stdout.write(`state=${home.state} sheet.y=${String(y)}\n`);
    await sleep(FRAME_MS);
  } while (home.state === "presenting-animating" || home.state === "dismissing-animating");
}

home.presentViewController(sheet, "slideUp");
await tickUntilIdle();

screen.queueEvent(buttonEvent("menu", true));
await tickUntilIdle();

process.stdout.write(`done after ${String(frames)} redraws\n`);
