import { createNodeApplication } from "@droidlet/node";
import { CounterActivity } from "./counterActivity.js";

const app = createNodeApplication({
  appName: "SimpleCounterApp",
  packageName: "com.example.simplecounter",
  interactive: true,
});

app.registerActivity("main", CounterActivity);
app.startActivity("main");
app.run();
