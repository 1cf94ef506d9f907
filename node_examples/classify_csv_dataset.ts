import { fileURLToPath } from "url";
import { IO } from "../src/utils/IO";
import { KNNClassifier } from "../src/ml/KNNClassifier";
import { DatasetRegistry } from "../src/core/DatasetRegistry";
import { evaluateClassifier } from "../src/core/Evaluation";

const dataFile = (file: string) => fileURLToPath(new URL(`./data/${file}`, import.meta.url));

// ✅ Load train/test splits next to this script
const train = IO.loadCSVFile(dataFile("fruit_train.csv"), { name: "fruit" });
const test = IO.loadCSVFile(dataFile("fruit_test.csv"));
console.log(`✅ Loaded ${train.points.length} training and ${test.points.length} test points.`);

const knn = new KNNClassifier({
    k: 3,
    registry: new DatasetRegistry([train]),
    log: { modelName: "FruitKNN", verbose: false },
});

const { accuracy, confusion } = evaluateClassifier(knn, train, test);
console.log(`📊 Test accuracy: ${(accuracy * 100).toFixed(1)}%`);
console.log(`   tp=${confusion.tp} tn=${confusion.tn} fp=${confusion.fp} fn=${confusion.fn}`);

const query = [7.2, 160];
console.log(`🏷️ [${query.join(", ")}] -> ${knn.classify("fruit", query)}`);
